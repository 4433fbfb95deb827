import { randomBytes } from 'crypto';

// 128 random bits, hex encoded
export const generateLeaseToken = (): string => randomBytes(16).toString('hex');
