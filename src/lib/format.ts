const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Fixed-decimal display value; raw means use 1 decimal, log means 2. */
export const formatMean = (value: number, decimals: 1 | 2): string => value.toFixed(decimals);

export const formatCount = (value: number): string => integerFormat.format(value);

/** `2020-01-01 00:00:00` in UTC, matching the timestamps GitHub returns. */
export const formatTimestamp = (date: Date): string =>
  date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');

export const formatDate = (epochMs: number): string => new Date(epochMs).toISOString().slice(0, 10);
