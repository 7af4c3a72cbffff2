export class ReferentialIntegrityError extends Error {
  constructor(
    message: string,
    public readonly context: {
      matchId: number;
      missingTournamentId?: number;
      missingPlayers?: string[];
      missingMatch?: boolean;
    }
  ) {
    super(message);
    this.name = 'ReferentialIntegrityError';
  }
}

export interface DatasetIssue {
  relation: 'players' | 'tournaments' | 'matches' | 'scores';
  path: string;
  message: string;
}

export class InvalidDatasetError extends Error {
  constructor(message: string, public readonly issues: DatasetIssue[] = []) {
    super(message);
    this.name = 'InvalidDatasetError';
  }
}

export class NoSampleDataError extends Error {
  constructor(
    message: string,
    public readonly context: { numerator: number; total: number }
  ) {
    super(message);
    this.name = 'NoSampleDataError';
  }
}
