import { Direction, type Digest, type Payload } from '@mirrorchain/core';
import { bigIntToDigest, toBytes, type HashEngine } from '../hash-engine.js';

/**
 * Reads the payload as a decimal integer and uses it as both digests,
 * so tests can pick exact forward/backward ratios.
 */
export class NumericHashEngine implements HashEngine {
  primaryDigest(payload: Payload): Digest {
    return bigIntToDigest(this.value(payload));
  }

  mirrorDigest(payload: Payload, _direction: Direction): Digest {
    return this.primaryDigest(payload);
  }

  protected value(payload: Payload): bigint {
    return BigInt(new TextDecoder().decode(toBytes(payload)));
  }
}

/**
 * Same primary digests as NumericHashEngine, doubled backward mirrors
 */
export class SkewedMirrorEngine extends NumericHashEngine {
  mirrorDigest(payload: Payload, direction: Direction): Digest {
    return direction === Direction.Forward
      ? this.primaryDigest(payload)
      : bigIntToDigest(this.value(payload) * 2n);
  }
}

export function numericDigest(value: bigint): Digest {
  return bigIntToDigest(value);
}

/** Let queued promise callbacks run */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
