export abstract class BoosterError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownSetError extends BoosterError {
  readonly code = 'UNKNOWN_SET';
  readonly httpStatus = 404;

  constructor(public readonly selector: string, detail?: string) {
    super(detail ?? `Unknown set '${selector}'`);
  }
}

/**
 * A sheet the set's composition depends on has no cards at all.
 * Indicates partial or bad card data rather than bad luck.
 */
export class EmptySheetError extends BoosterError {
  readonly code = 'EMPTY_SHEET';
  readonly httpStatus = 422;

  constructor(public readonly setCode: string, public readonly sheet: string) {
    super(`Set ${setCode} has no cards on its ${sheet} sheet`);
  }
}

export class InsufficientCardsError extends BoosterError {
  readonly code = 'INSUFFICIENT_CARDS';
  readonly httpStatus = 422;

  constructor(
    public readonly setCode: string,
    public readonly sheet: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(`Set ${setCode} needs ${required} cards from its ${sheet} sheet but only ${available} are available`);
  }
}

export class InvalidRequestError extends BoosterError {
  readonly code = 'INVALID_REQUEST';
  readonly httpStatus = 400;
}

export class CardDataError extends BoosterError {
  readonly code = 'CARD_DATA';
  readonly httpStatus = 500;
}

export class ConfigurationError extends BoosterError {
  readonly code = 'CONFIGURATION';
  readonly httpStatus = 500;
}
