/** The closed set of B3 context flags, one bit each. */
export const Flag = {
  Debug:       0b0001,
  SamplingSet: 0b0010,
  Sampled:     0b0100,
  IsRoot:      0b1000,
} as const;

export type Flag = (typeof Flag)[keyof typeof Flag];

/** Bitmask of Flag values. */
export type FlagSet = number;

export const NO_FLAGS: FlagSet = 0;

const FLAG_NAMES: readonly [Flag, string][] = [
  [Flag.Debug,       "debug"],
  [Flag.SamplingSet, "sampling_set"],
  [Flag.Sampled,     "sampled"],
  [Flag.IsRoot,      "is_root"],
];

export function flagsOf(...flags: Flag[]): FlagSet {
  return flags.reduce<FlagSet>((set, flag) => set | flag, NO_FLAGS);
}

export function hasFlag(set: FlagSet, flag: Flag): boolean {
  return (set & flag) !== 0;
}

export function withFlag(set: FlagSet, flag: Flag): FlagSet {
  return set | flag;
}

export function withoutFlag(set: FlagSet, flag: Flag): FlagSet {
  return set & ~flag;
}

/** Names of the flags in `set`, in declaration order. */
export function flagNames(set: FlagSet): string[] {
  return FLAG_NAMES.filter(([flag]) => hasFlag(set, flag)).map(([, name]) => name);
}
