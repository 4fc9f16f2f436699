import type { Validator } from '~/types';
import { isIPv6 } from 'node:net';
import { VALID, failure } from '~/result';

export const isIPv4 = (value: string): boolean => {
  if (!/^(\d{1,3}\.){3}\d{1,3}$/.test(value)) return false;
  return value.split('.').every(num => {
    const n = parseInt(num, 10);
    return n >= 0 && n <= 255;
  });
};

const stringFormat = (test: (value: string) => boolean, message: string): Validator => {
  return value => {
    if (typeof value !== 'string' || test(value)) {
      return VALID;
    }

    return failure(message);
  };
};

export const defaultFormats: Readonly<Record<string, Validator>> = Object.freeze({
  ipv4: stringFormat(isIPv4, 'Value must be a valid IPv4 address'),
  ipv6: stringFormat(isIPv6, 'Value must be a valid IPv6 address')
});
