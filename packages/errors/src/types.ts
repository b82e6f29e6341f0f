/**
 * User-facing error text: a one-line headline and an optional detail line.
 */
export type UserErrorMessage = readonly [headline: string, detail?: string];
