export const bytes = (text: string): Uint8Array => Buffer.from(text);

export const text = (payload: Uint8Array | undefined): string | undefined =>
  payload === undefined ? undefined : Buffer.from(payload).toString('utf8');
