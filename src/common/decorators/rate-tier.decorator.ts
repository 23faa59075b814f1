import { SkipThrottle } from '@nestjs/throttler';

/** Names of the throttlers registered in AppModule. */
export const CREATE_THROTTLER = 'create';
export const READ_THROTTLER = 'read';

export type RateTier = typeof CREATE_THROTTLER | typeof READ_THROTTLER;

/**
 * Puts a route in one quota tier. Every named throttler applies to every
 * route by default, so a tier is selected by skipping the other one.
 */
export const RateTier = (tier: RateTier) =>
  tier === CREATE_THROTTLER
    ? SkipThrottle({ [READ_THROTTLER]: true })
    : SkipThrottle({ [CREATE_THROTTLER]: true });
