export { Configuration, loadConfiguration } from './core/config';
export {
  DEFAULT_CUTOFF_FACTOR,
  DEFAULT_EPSILON,
  ElementsSchema,
  LJParamsSchema,
  createLJParams,
  generateDefaultLJParams,
  parseElements
} from './core/ljParams';
export {
  ConfigurationError,
  EmptyElementSetError,
  MalformedElementsError,
  MalformedLJParamsError,
  UnknownElementError
} from './core/errors';
export {
  atomicNumber,
  covalentRadius,
  getElement,
  isKnownElement,
  listElements
} from './data/elements';
export * from './models/types';
