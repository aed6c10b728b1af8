/**
 * Daily protocol counter.
 *
 * `increment` must be atomic: concurrent callers for the same day each get a
 * distinct value, starting at 1 for the first call of that day. Counters are
 * handed out by a requester write scope, so an increment commits or rolls
 * back together with the request that uses it.
 */
export interface ProtocolCounter {
  increment(day: string): Promise<number>;
}
