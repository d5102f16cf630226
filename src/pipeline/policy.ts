/**
 * The single place that decides which candidate wins when the user has not chosen one.
 * Today that is always the first listed item.
 */
export const pickDefault = <T>(sequence: readonly T[]): T | undefined => sequence[0];
