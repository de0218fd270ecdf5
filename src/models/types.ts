export interface LJParams {
  readonly epsilon: number;
  readonly sigma: number;
  readonly cutoff: number;
}

export type LJParamsRecord = {
  epsilon: number;
  sigma: number;
  cutoff: number;
};

export interface DefaultLJOptions {
  epsilon?: number;
  cutoffFactor?: number;
}

export type RawConfiguration = Record<string, unknown>;

export type ConfigurationRecord = {
  elements: string[];
  lj_params: LJParamsRecord;
};

export interface ElementData {
  atomicNumber: number;
  symbol: string;
  name: string;
  covalentRadius: number; // Angstrom
}

export type ConfigurationErrorCode =
  | 'EMPTY_ELEMENT_SET'
  | 'UNKNOWN_ELEMENT'
  | 'MALFORMED_LJ_PARAMS'
  | 'MALFORMED_ELEMENTS';
