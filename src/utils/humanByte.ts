// Byte sizes with an explicit unit, e.g. `10MiB` or `1.5 GB`

export type SizeUnit = 'B' | 'KB' | 'KiB' | 'MB' | 'MiB' | 'GB' | 'GiB' | 'TB' | 'TiB' | 'PB' | 'PiB';

export interface HumanByte {
  size: number;
  unit: SizeUnit;
}

export const SIZE_UNIT_FACTORS: Record<SizeUnit, number> = {
  B: 1,
  KB: 1000,
  KiB: 1024,
  MB: 1000 ** 2,
  MiB: 1024 ** 2,
  GB: 1000 ** 3,
  GiB: 1024 ** 3,
  TB: 1000 ** 4,
  TiB: 1024 ** 4,
  PB: 1000 ** 5,
  PiB: 1024 ** 5,
};

/** Units offered by the bandwidth selector. */
export const BANDWIDTH_UNITS: readonly SizeUnit[] = ['B', 'KB', 'KiB', 'MB', 'MiB', 'GB', 'GiB'];

const BINARY_UNITS: readonly SizeUnit[] = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'];

// lower case suffix to unit; a single prefix letter is binary
const SUFFIXES: Record<string, SizeUnit> = {
  '': 'B',
  b: 'B',
  kb: 'KB',
  k: 'KiB',
  kib: 'KiB',
  mb: 'MB',
  m: 'MiB',
  mib: 'MiB',
  gb: 'GB',
  g: 'GiB',
  gib: 'GiB',
  tb: 'TB',
  t: 'TiB',
  tib: 'TiB',
  pb: 'PB',
  p: 'PiB',
  pib: 'PiB',
};

/** Throws when the text is not a non-negative number with a known unit. */
export function parseHumanByte(text: string): HumanByte {
  const match = /^(\d+(?:\.\d*)?|\.\d+)\s*([A-Za-z]*)$/.exec(text.trim());
  if (!match) throw new Error('unable to parse number');
  const unit = SUFFIXES[match[2].toLowerCase()];
  if (unit === undefined) throw new Error(`unknown unit '${match[2]}'`);
  return { size: Number(match[1]), unit };
}

export const tryParseHumanByte = (text: string): HumanByte | null => {
  try {
    return parseHumanByte(text);
  } catch {
    return null;
  }
};

/** Up to three decimals, no separator: `1.5GiB`. */
export const formatHumanByte = (value: HumanByte): string => `${Number(value.size.toFixed(3))}${value.unit}`;

export const humanByteToBytes = (value: HumanByte): number => value.size * SIZE_UNIT_FACTORS[value.unit];

/** Scale a byte count to the largest binary unit it fills. */
export function humanByteFromBytes(bytes: number): HumanByte {
  let index = 0;
  while (index < BINARY_UNITS.length - 1 && bytes >= SIZE_UNIT_FACTORS[BINARY_UNITS[index + 1]]) index++;
  const unit = BINARY_UNITS[index];
  return { size: bytes / SIZE_UNIT_FACTORS[unit], unit };
}
