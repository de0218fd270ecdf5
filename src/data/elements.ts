import { ElementData } from '../models/types';
import { UnknownElementError } from '../core/errors';
import elementTable from './elements.json';

// Covalent radii (Angstrom) from Cordero et al., Dalton Trans. 2008, H through Cm;
// Bk through Og carry the 0.2 placeholder of tables without measured values.
const ELEMENTS: readonly ElementData[] = Object.freeze(
  elementTable.map(entry => Object.freeze({ ...entry }))
);

const COVALENT_RADII: readonly number[] = (() => {
  const radii: number[] = [];
  for (const element of ELEMENTS) {
    radii[element.atomicNumber] = element.covalentRadius;
  }
  return Object.freeze(radii);
})();

const ATOMIC_NUMBERS: ReadonlyMap<string, number> = new Map(
  ELEMENTS.map(element => [element.symbol, element.atomicNumber])
);

export function isKnownElement(symbol: string): boolean {
  return ATOMIC_NUMBERS.has(symbol);
}

/** Case-sensitive: "Fe" resolves, "fe" and "FE" do not. */
export function atomicNumber(symbol: string): number {
  const z = ATOMIC_NUMBERS.get(symbol);
  if (z === undefined) {
    throw new UnknownElementError(symbol);
  }
  return z;
}

export function covalentRadius(symbol: string): number {
  return COVALENT_RADII[atomicNumber(symbol)];
}

export function getElement(symbol: string): ElementData {
  const z = atomicNumber(symbol);
  const element = ELEMENTS.find(entry => entry.atomicNumber === z);
  if (!element) {
    throw new UnknownElementError(symbol);
  }
  return { ...element };
}

export function listElements(): ElementData[] {
  return ELEMENTS.map(element => ({ ...element }));
}
