/**
 * Read-only set of threat indicators.
 *
 * Membership is an exact, case-sensitive string match. No CIDR
 * expansion and no address canonicalization.
 */
export interface ThreatIndicatorSet {
  readonly size: number;
  contains(address: string): boolean;
}
