/**
 * Encoding Result
 * One per encode() call, frozen once built.
 */

import { ComponentKind, ResultMetadata } from '../types.js';

export interface EncodingResultInit {
  original: string;
  kind: ComponentKind;
  compressed: string;
  metadata: ResultMetadata;
  nTokens: number;
  cTokens: number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class EncodingResult {
  readonly original: string;
  readonly kind: ComponentKind;
  readonly compressed: string;
  readonly metadata: ResultMetadata;
  /** estimated tokens of the original */
  readonly nTokens: number;
  /** estimated tokens of the compressed text */
  readonly cTokens: number;

  constructor(init: EncodingResultInit) {
    this.original = init.original;
    this.kind = init.kind;
    this.compressed = init.compressed;
    // the caller's own objects are copied one level deep, never frozen in place
    const { caller, ...rest } = init.metadata;
    this.metadata = deepFreeze({ ...rest, caller: Object.freeze({ ...caller }) });
    this.nTokens = init.nTokens;
    this.cTokens = init.cTokens;
    Object.freeze(this);
  }

  /** `(1 - cTokens / nTokens) * 100`, never negative */
  get compressionRatio(): number {
    if (this.nTokens <= 0) return 0;
    return Math.max(0, (1 - this.cTokens / this.nTokens) * 100);
  }

  get fallbackApplied(): boolean {
    return this.metadata.fallback.applied;
  }

  toJSON(): Record<string, unknown> {
    return {
      original: this.original,
      kind: this.kind,
      compressed: this.compressed,
      nTokens: this.nTokens,
      cTokens: this.cTokens,
      compressionRatio: this.compressionRatio,
      metadata: this.metadata,
    };
  }
}
