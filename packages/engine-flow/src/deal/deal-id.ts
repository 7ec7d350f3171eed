import { createHash, randomBytes } from 'node:crypto';

const TAG_LENGTH = 4;
const TIMESTAMP_LENGTH = 9;
const SEQUENCE_LENGTH = 4;
const CHECK_LENGTH = 6;

export const DEAL_ID_LENGTH = TAG_LENGTH + TIMESTAMP_LENGTH + SEQUENCE_LENGTH + CHECK_LENGTH;

const SEQUENCE_SPACE = 36 ** SEQUENCE_LENGTH;
const DEAL_ID_PATTERN = new RegExp(`^[0-9A-Z]{${DEAL_ID_LENGTH}}$`);

export interface ParsedDealId {
  sellerTag: string;
  /** Proposal timestamp, epoch ms. */
  timestamp: number;
  sequence: number;
}

/** First 48 bits of a SHA-256 digest, rendered as fixed-width uppercase base 36. */
function digest36(input: string, length: number): string {
  const head = parseInt(createHash('sha256').update(input).digest('hex').slice(0, 12), 16);
  return head.toString(36).toUpperCase().padStart(length, '0').slice(-length);
}

function base36(value: number, length: number): string {
  return value.toString(36).toUpperCase().padStart(length, '0');
}

/** Opaque 4-char tag for a seller org. Carries no readable part of the org id. */
export function sellerTag(sellerOrgId: string): string {
  return digest36(`seller:${sellerOrgId}`, TAG_LENGTH);
}

/**
 * Deal identifiers: `TTTT` seller tag, 9-char base-36 proposal timestamp,
 * 4-char base-36 sequence, 6-char check over all inputs and an instance nonce.
 * 23 uppercase alphanumerics, safe to pass to any DSP as-is.
 *
 * The sequence is per instance and wraps after 36^4 ids; the nonce keeps two
 * instances that land on the same timestamp and sequence apart.
 */
export class DealIdGenerator {
  private sequence = 0;
  private readonly nonce: string;

  constructor(options: { nonce?: string } = {}) {
    this.nonce = options.nonce ?? randomBytes(8).toString('hex');
  }

  generate(sellerOrgId: string, productId: string, proposalTimestamp: number): string {
    if (!Number.isSafeInteger(proposalTimestamp) || proposalTimestamp < 0) {
      throw new RangeError(`proposalTimestamp must be a non-negative integer, got ${proposalTimestamp}`);
    }
    const timestamp = base36(proposalTimestamp, TIMESTAMP_LENGTH);
    if (timestamp.length > TIMESTAMP_LENGTH) {
      throw new RangeError(`proposalTimestamp ${proposalTimestamp} does not fit the deal id`);
    }
    const sequence = this.sequence;
    this.sequence = (this.sequence + 1) % SEQUENCE_SPACE;

    const check = digest36(
      [sellerOrgId, productId, proposalTimestamp, sequence, this.nonce].join('|'),
      CHECK_LENGTH,
    );
    return `${sellerTag(sellerOrgId)}${timestamp}${base36(sequence, SEQUENCE_LENGTH)}${check}`;
  }
}

/** Recover the readable parts of a deal id, or null when it is malformed. */
export function parseDealId(dealId: string): ParsedDealId | null {
  if (!DEAL_ID_PATTERN.test(dealId)) return null;
  const tsEnd = TAG_LENGTH + TIMESTAMP_LENGTH;
  return {
    sellerTag: dealId.slice(0, TAG_LENGTH),
    timestamp: parseInt(dealId.slice(TAG_LENGTH, tsEnd), 36),
    sequence: parseInt(dealId.slice(tsEnd, tsEnd + SEQUENCE_LENGTH), 36),
  };
}
