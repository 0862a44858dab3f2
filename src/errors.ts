export type GridBotErrorCode =
  | 'data_unavailable'
  | 'insufficient_data'
  | 'placement_failure'
  | 'reconciliation_ambiguity'
  | 'risk_limit_breach'
  | 'configuration_invalid'
  | 'startup_failure';

export class GridBotError extends Error {
  readonly code: GridBotErrorCode;

  constructor(code: GridBotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Ticker or candle data could not be fetched. Never fatal. */
export class DataUnavailableError extends GridBotError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: Extract<GridBotErrorCode, 'data_unavailable' | 'insufficient_data'> = 'data_unavailable'
  ) {
    super(code, message, options);
  }
}

/** Fewer candles than an indicator's window needs. */
export class InsufficientDataError extends DataUnavailableError {
  readonly required: number;
  readonly received: number;

  constructor(what: string, required: number, received: number) {
    super(`insufficient_data:${what}:${received}/${required}`, undefined, 'insufficient_data');
    this.required = required;
    this.received = received;
  }
}

export class PlacementFailureError extends GridBotError {
  readonly side: string;
  readonly price: number;

  constructor(side: string, price: number, options?: { cause?: unknown }) {
    super('placement_failure', `placement_failed:${side}@${price}`, options);
    this.side = side;
    this.price = price;
  }
}

export class ReconciliationAmbiguityError extends GridBotError {
  readonly orderId: string;

  constructor(orderId: string, detail: string) {
    super('reconciliation_ambiguity', `reconciliation_ambiguous:${orderId}:${detail}`);
    this.orderId = orderId;
  }
}

/** The only condition that halts trading. */
export class RiskLimitBreachError extends GridBotError {
  readonly reason: string;

  constructor(reason: string) {
    super('risk_limit_breach', reason);
    this.reason = reason;
  }
}

export class ConfigurationInvalidError extends GridBotError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('configuration_invalid', `configuration_invalid: ${violations.join('; ')}`);
    this.violations = [...violations];
  }
}

/** Startup could not reach a tradeable state (no balance, no price, empty ladder). */
export class StartupFailureError extends GridBotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('startup_failure', message, options);
  }
}
