// Eviction policies understood by the server, and their wire spelling

export type PaperPolicy =
  | { readonly type: 'auto' }
  | { readonly type: 'lfu' }
  | { readonly type: 'fifo' }
  | { readonly type: 'clock' }
  | { readonly type: 'sieve' }
  | { readonly type: 'lru' }
  | { readonly type: 'mru' }
  | { readonly type: 'arc' }
  | { readonly type: '2q'; readonly kIn: number; readonly kOut: number }
  | { readonly type: 's3-fifo'; readonly ratio: number };

type SimplePolicyType = Exclude<PaperPolicy['type'], '2q' | 's3-fifo'>;

const SIMPLE_POLICIES: readonly SimplePolicyType[] = ['auto', 'lfu', 'fifo', 'clock', 'sieve', 'lru', 'mru', 'arc'];

function isSimplePolicyType(value: string): value is SimplePolicyType {
  return SIMPLE_POLICIES.some((type) => type === value);
}

/**
 * Policy constructors
 *
 * ```typescript
 * await client.setPolicy(PaperPolicy.twoQ(0.25, 0.5));
 * ```
 */
export const PaperPolicy = {
  auto: (): PaperPolicy => ({ type: 'auto' }),
  lfu: (): PaperPolicy => ({ type: 'lfu' }),
  fifo: (): PaperPolicy => ({ type: 'fifo' }),
  clock: (): PaperPolicy => ({ type: 'clock' }),
  sieve: (): PaperPolicy => ({ type: 'sieve' }),
  lru: (): PaperPolicy => ({ type: 'lru' }),
  mru: (): PaperPolicy => ({ type: 'mru' }),
  arc: (): PaperPolicy => ({ type: 'arc' }),
  twoQ: (kIn: number, kOut: number): PaperPolicy => ({ type: '2q', kIn, kOut }),
  s3Fifo: (ratio: number): PaperPolicy => ({ type: 's3-fifo', ratio }),
};

/**
 * Render a policy the way the server spells it, e.g. "2q-0.25-0.5"
 */
export function formatPolicy(policy: PaperPolicy): string {
  switch (policy.type) {
    case '2q':
      return `2q-${policy.kIn}-${policy.kOut}`;
    case 's3-fifo':
      return `s3-fifo-${policy.ratio}`;
    default:
      return policy.type;
  }
}

// Unsigned decimals as Number#toString writes them: no hex, binary, padding or sign
const DECIMAL = String.raw`(\d+(?:\.\d+)?(?:e[+-]?\d+)?)`;
const TWO_Q_PATTERN = new RegExp(`^2q-${DECIMAL}-${DECIMAL}$`);
const S3_FIFO_PATTERN = new RegExp(`^s3-fifo-${DECIMAL}$`);

/**
 * Parse the server's policy spelling
 * Returns null for anything unrecognised
 */
export function parsePolicy(value: string): PaperPolicy | null {
  if (isSimplePolicyType(value)) {
    return { type: value };
  }

  const twoQ = TWO_Q_PATTERN.exec(value);
  if (twoQ !== null) {
    const kIn = toFinite(twoQ[1]);
    const kOut = toFinite(twoQ[2]);
    return kIn === null || kOut === null ? null : { type: '2q', kIn, kOut };
  }

  const s3Fifo = S3_FIFO_PATTERN.exec(value);
  if (s3Fifo !== null) {
    const ratio = toFinite(s3Fifo[1]);
    return ratio === null ? null : { type: 's3-fifo', ratio };
  }

  return null;
}

function toFinite(token: string | undefined): number | null {
  const value = Number(token);
  return token !== undefined && Number.isFinite(value) ? value : null;
}
