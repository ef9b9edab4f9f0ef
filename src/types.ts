export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Xyz {
  x: number;
  y: number;
  z: number;
}

export interface Lab {
  L: number;
  a: number;
  b: number;
}

export type ShadeSystemId = 'vita-classical' | 'vita-3d-master' | 'ivoclar-chromascop';

export interface ShadeEntry {
  label: string;
  rgb: Rgb;
}

export interface ShadeTable {
  id: ShadeSystemId;
  name: string;
  shades: ShadeEntry[];
}

export interface ShadeGuideSet {
  version: string;
  systems: ShadeTable[];
}

export type SamplingMode = 'average' | 'center' | 'point' | 'rect';

export type SampleRegion =
  | { kind: 'point'; x: number; y: number }
  | { kind: 'rect'; x: number; y: number; width: number; height: number };

export interface ShadeMatch {
  systemId: ShadeSystemId;
  systemName: string;
  shade: string;
  deltaE: number;
}

export interface ManualOverride {
  systemId?: ShadeSystemId;
  shade: string;
}

export type Sex = 'Male' | 'Female' | 'Other';

export interface PatientInfo {
  name: string;
  age: number;
  sex: Sex;
}

export interface PatientRecord {
  id: string;
  patient: PatientInfo;
  sampledColor: Rgb;
  sampledHex: string;
  samplingMode: SamplingMode;
  matches: ShadeMatch[];
  manualOverride: ManualOverride | null;
  imagePath: string;
  pdfPath: string;
  createdAt: string;
}
