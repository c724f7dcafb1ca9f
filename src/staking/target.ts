import { SECONDS_PER_DAY } from '../chain/constants.js';
import { ceilDiv } from '../chain/values.js';

const ONE_ETHER = 1_000_000_000_000_000_000n;

/**
 * Requests a service must make per day to satisfy an activity checker.
 * `livenessRatio` is requests per second scaled by 1e18; the result rounds up.
 */
export function computeRequiredDailyRequests(livenessRatio: bigint): number {
  if (livenessRatio < 0n) {
    throw new RangeError(`livenessRatio must be non-negative, got ${livenessRatio}`);
  }

  const required = ceilDiv(livenessRatio * BigInt(SECONDS_PER_DAY), ONE_ETHER);
  if (required > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`Required daily requests overflowed JS number range: ${required}`);
  }
  return Number(required);
}

/**
 * Requests made since the last checkpoint. Negative when the checkpoint
 * baseline is ahead of the lifetime counter.
 */
export function computeEpochRequests(lifetimeCount: bigint, checkpointCount: bigint): number {
  const requests = lifetimeCount - checkpointCount;
  const limit = BigInt(Number.MAX_SAFE_INTEGER);
  if (requests > limit || requests < -limit) {
    throw new RangeError(`Epoch request count outside JS number range: ${requests}`);
  }
  return Number(requests);
}
