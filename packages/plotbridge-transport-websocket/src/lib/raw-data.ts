import type { RawData } from 'ws';

/**
 * Text of an inbound frame. Binary frames are decoded as UTF-8.
 */
export const rawDataToText = (data: RawData): string => {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
};
