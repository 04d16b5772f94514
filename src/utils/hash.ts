import { createHash } from 'node:crypto';

export const hashString = (input: string) => createHash('sha256').update(input).digest('hex');
export const hashJson   = (value: unknown) => hashString(JSON.stringify(value));
