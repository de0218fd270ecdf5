import { ConfigurationErrorCode } from '../models/types';

export class ConfigurationError extends Error {
  public readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyElementSetError extends ConfigurationError {
  constructor() {
    super('EMPTY_ELEMENT_SET', 'Cannot generate LJ params: No elements provided.');
  }
}

export class UnknownElementError extends ConfigurationError {
  public readonly symbol: string;

  constructor(symbol: string) {
    super('UNKNOWN_ELEMENT', `Unknown element symbol: ${symbol}`);
    this.symbol = symbol;
  }
}

export class MalformedLJParamsError extends ConfigurationError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super('MALFORMED_LJ_PARAMS', `Malformed lj_params: ${message}`);
    this.field = field;
  }
}

export class MalformedElementsError extends ConfigurationError {
  constructor(message: string) {
    super('MALFORMED_ELEMENTS', `Malformed elements: ${message}`);
  }
}
