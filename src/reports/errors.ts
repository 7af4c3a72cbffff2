export class ReportLookupError extends Error {
  constructor(public readonly reportId: string) {
    super(`Report not found: ${reportId}`);
    this.name = 'ReportLookupError';
  }
}

export class ReportOptionsError extends Error {
  constructor(
    message: string,
    public readonly context: { reportId: string; option: 'minSample' }
  ) {
    super(message);
    this.name = 'ReportOptionsError';
  }
}
