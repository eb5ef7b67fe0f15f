// flags.ts

/** Serialization hints; they do not affect lookups. */
export const NodeFlag = {
  None: 0,
  /** Serialize children as an object even if every key is numeric. */
  ForceMap: 1 << 0,
  /** Serialize children as an array even if some keys are not numeric. */
  ForceArray: 1 << 1,
} as const;

export type NodeFlag = (typeof NodeFlag)[keyof typeof NodeFlag];
