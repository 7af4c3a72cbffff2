export class DatasetSourceError extends Error {
  constructor(
    message: string,
    public readonly context: {
      source: string;
      relation?: string;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'DatasetSourceError';
  }
}

export {
  InvalidDatasetError,
  NoSampleDataError,
  ReferentialIntegrityError,
} from '../engine/errors.js';
