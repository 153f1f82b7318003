/**
 * Envelope returned by the classification service
 */
export class ClassificationResponse {
  static readonly SUCCESS = 'success';

  constructor(
    public readonly status: string,
    public readonly data: number = 0,
  ) {}

  /**
   * Only a literal "success" counts; any other status is a non-success envelope
   */
  isSuccess(): boolean {
    return this.status === ClassificationResponse.SUCCESS;
  }
}
