import {
  Order,
  OrderPriority,
  OrderStatus,
  OrderType,
  derivePriority,
  deriveClassifiedStatus,
  deriveFlagStatus,
  needsHighValueNote,
  toOrderVariant,
  isFailureStatus,
} from '../../src';

describe('Order rules', () => {
  describe('Order model', () => {
    it('should start as new with low priority', () => {
      const order = new Order(1, 'A', 500, true);

      expect(order.status).toBe(OrderStatus.NEW);
      expect(order.priority).toBe(OrderPriority.LOW);
    });

    it('should render export fields in column order', () => {
      const order = new Order(7, 'A', 250, false);

      expect(order.toRow()).toEqual(['7', 'A', '250', 'false', 'new', 'low']);
    });

    it('should render missing fields as empty strings', () => {
      const order = new Order(null, null);

      expect(order.toRow()).toEqual(['', '', '', 'false', 'new', 'low']);
    });

    it('should treat missing or non-numeric amounts as zero', () => {
      expect(new Order(1, 'B', null).effectiveAmount).toBe(0);
      expect(new Order(2, 'B', Number.NaN).effectiveAmount).toBe(0);
      expect(new Order(3, 'B', 42.5).effectiveAmount).toBe(42.5);
    });

    it('should only count an explicit true flag', () => {
      expect(new Order(1, 'C', 10, true).isFlagged).toBe(true);
      expect(new Order(2, 'C', 10, false).isFlagged).toBe(false);
      expect(new Order(3, 'C', 10, null).isFlagged).toBe(false);
    });
  });

  describe('Priority', () => {
    it('should be high only strictly above 200', () => {
      expect(derivePriority(new Order(1, 'C', 200))).toBe(OrderPriority.LOW);
      expect(derivePriority(new Order(2, 'C', 200.01))).toBe(OrderPriority.HIGH);
      expect(derivePriority(new Order(3, 'C', null))).toBe(OrderPriority.LOW);
    });
  });

  describe('High value note', () => {
    it('should apply strictly above 150', () => {
      expect(needsHighValueNote(new Order(1, 'A', 150))).toBe(false);
      expect(needsHighValueNote(new Order(2, 'A', 151))).toBe(true);
    });
  });

  describe('Classified status', () => {
    it('should process small orders with high data', () => {
      expect(deriveClassifiedStatus(new Order(1, 'B', 80, false), 60)).toBe(
        OrderStatus.PROCESSED,
      );
    });

    it('should keep orders with low data pending', () => {
      expect(deriveClassifiedStatus(new Order(1, 'B', 80, false), 40)).toBe(
        OrderStatus.PENDING,
      );
    });

    it('should check the amount rule before the flag rule', () => {
      expect(deriveClassifiedStatus(new Order(1, 'B', 80, true), 60)).toBe(
        OrderStatus.PROCESSED,
      );
      expect(deriveClassifiedStatus(new Order(2, 'B', 150, true), 60)).toBe(
        OrderStatus.PENDING,
      );
    });

    it('should fall through to error when no rule matches', () => {
      expect(deriveClassifiedStatus(new Order(1, 'B', 150, false), 50)).toBe(
        OrderStatus.ERROR,
      );
      expect(deriveClassifiedStatus(new Order(2, 'B', 100, false), 50)).toBe(
        OrderStatus.ERROR,
      );
    });

    it('should treat data of exactly 50 as high', () => {
      expect(deriveClassifiedStatus(new Order(1, 'B', 99.99, false), 50)).toBe(
        OrderStatus.PROCESSED,
      );
    });
  });

  describe('Flag status', () => {
    it('should complete flagged orders', () => {
      expect(deriveFlagStatus(new Order(1, 'C', 10, true))).toBe(
        OrderStatus.COMPLETED,
      );
      expect(deriveFlagStatus(new Order(2, 'C', 10, false))).toBe(
        OrderStatus.IN_PROGRESS,
      );
    });
  });

  describe('Variants', () => {
    it('should tag known types', () => {
      expect(toOrderVariant(new Order(1, 'A')).kind).toBe(OrderType.A);
      expect(toOrderVariant(new Order(2, 'B')).kind).toBe(OrderType.B);
      expect(toOrderVariant(new Order(3, 'C')).kind).toBe(OrderType.C);
    });

    it('should tag everything else as unknown', () => {
      expect(toOrderVariant(new Order(1, 'a')).kind).toBe('unknown');
      expect(toOrderVariant(new Order(2, 'D')).kind).toBe('unknown');
      expect(toOrderVariant(new Order(3, null)).kind).toBe('unknown');
    });
  });

  describe('Failure statuses', () => {
    it('should flag recovered faults only', () => {
      expect(isFailureStatus(OrderStatus.DB_ERROR)).toBe(true);
      expect(isFailureStatus(OrderStatus.API_FAILURE)).toBe(true);
      expect(isFailureStatus(OrderStatus.ERROR)).toBe(false);
      expect(isFailureStatus(OrderStatus.UNKNOWN_TYPE)).toBe(false);
    });
  });
});
