export type { HashHex } from '@bftsim/types';

/** Returns an integer in `[0, maxExclusive)`. Injected wherever a choice must be random. */
export type RandomSource = (maxExclusive: number) => number;
