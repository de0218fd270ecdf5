import { ConfigurationRecord, LJParams, RawConfiguration } from '../models/types';
import { createLJParams, generateDefaultLJParams, parseElements } from './ljParams';

export class Configuration {
  public readonly elements: readonly string[];
  public readonly ljParams: LJParams;

  constructor(elements: readonly string[], ljParams: LJParams) {
    this.elements = Object.freeze([...elements]);
    this.ljParams = Object.freeze({ ...ljParams });
    Object.freeze(this);
  }

  public static fromRecord(raw: RawConfiguration): Configuration {
    const elements = readElements(raw.elements);
    const ljParams = isEmptyValue(raw.lj_params)
      ? generateDefaultLJParams(elements)
      : createLJParams(raw.lj_params);

    return new Configuration(elements, ljParams);
  }

  public getElements(): string[] {
    return [...this.elements];
  }

  public getLJParams(): LJParams {
    return { ...this.ljParams };
  }

  public toRecord(): ConfigurationRecord {
    return {
      elements: this.getElements(),
      lj_params: {
        epsilon: this.ljParams.epsilon,
        sigma: this.ljParams.sigma,
        cutoff: this.ljParams.cutoff
      }
    };
  }
}

export function loadConfiguration(raw: RawConfiguration): Configuration {
  return Configuration.fromRecord(raw);
}

function readElements(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  return parseElements(value);
}

// Falsy values, [] and {} fall back to generated defaults.
function isEmptyValue(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value !== 'object') return false;

  const proto: unknown = Object.getPrototypeOf(value);
  const isPlain = proto === Object.prototype || proto === null;
  return isPlain && Object.keys(value).length === 0;
}
