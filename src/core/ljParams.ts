import { z } from 'zod';
import { DefaultLJOptions, LJParams } from '../models/types';
import { covalentRadius } from '../data/elements';
import { calculateMean } from '../utils/statistics';
import { EmptyElementSetError, MalformedElementsError, MalformedLJParamsError } from './errors';

export const DEFAULT_EPSILON = 1.0;
export const DEFAULT_CUTOFF_FACTOR = 2.5;

// Ratio sigma / r_min for the LJ potential, where r_min = 2^(1/6) * sigma.
const SIGMA_PER_MINIMUM = Math.pow(2, -1 / 6);

export const LJParamsSchema = z
  .object({
    epsilon: z.number().finite(),
    sigma: z.number().finite(),
    cutoff: z.number().finite()
  })
  .strict();

export const ElementsSchema = z.array(z.string());

/** sigma = 2 * mean covalent radius * 2^(-1/6), cutoff = sigma * cutoffFactor. */
export function generateDefaultLJParams(
  elements: readonly string[],
  options: DefaultLJOptions = {}
): LJParams {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const cutoffFactor = options.cutoffFactor ?? DEFAULT_CUTOFF_FACTOR;

  if (!Number.isFinite(epsilon)) {
    throw new Error('epsilon must be a finite number');
  }
  if (!Number.isFinite(cutoffFactor)) {
    throw new Error('cutoffFactor must be a finite number');
  }
  if (elements.length === 0) {
    throw new EmptyElementSetError();
  }

  // Summed in ascending order so the mean does not depend on input order.
  const radii = elements.map(symbol => covalentRadius(symbol)).sort((a, b) => a - b);
  const rAvg = calculateMean(radii);

  const sigma = 2 * rAvg * SIGMA_PER_MINIMUM;
  const cutoff = sigma * cutoffFactor;

  return Object.freeze({ epsilon, sigma, cutoff });
}

export function createLJParams(record: unknown): LJParams {
  const result = LJParamsSchema.safeParse(record);
  if (!result.success) {
    throw toMalformedLJParams(result.error);
  }
  return Object.freeze({ ...result.data });
}

export function parseElements(value: unknown): string[] {
  const result = ElementsSchema.safeParse(value);
  if (!result.success) {
    throw new MalformedElementsError('expected a list of element symbols');
  }
  return result.data;
}

function toMalformedLJParams(error: z.ZodError): MalformedLJParamsError {
  const issue = error.issues[0];

  if (issue.code === 'unrecognized_keys') {
    const key = issue.keys[0];
    return new MalformedLJParamsError(`unexpected field "${key}"`, key);
  }

  const field = issue.path[0];
  if (typeof field !== 'string') {
    return new MalformedLJParamsError('expected a mapping with epsilon, sigma and cutoff');
  }
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return new MalformedLJParamsError(`missing required field "${field}"`, field);
  }
  return new MalformedLJParamsError(`field "${field}" must be a finite number`, field);
}
