import type { PiiType } from '../types';
import { isLikelyIpv4, isValidHostname } from './validators';

export interface PiiPattern {
  key: PiiType;
  regex: RegExp;
  validate?: (match: string) => boolean;
}

export type PhoneRegionHint = 'US' | 'GB' | 'CA' | 'AU';

export interface PhoneGrammar {
  regex: RegExp;
  minDigits: number;
  maxDigits: number;
}

const OCTET = '(?:25[0-5]|2[0-4]\\d|[01]?\\d\\d?)';

export const EMAIL_PATTERN: PiiPattern = {
  key: 'email',
  regex: /\b[A-Za-z0-9._%+-]+@(?:[A-Za-z0-9-]+\.)+[A-Za-z]{2,}\b/g
};

// No digit or dot may touch either end, so 1.2.3.4.5 and 192.168.1.256 never yield an address.
export const IPV4_PATTERN: PiiPattern = {
  key: 'ip',
  regex: new RegExp(`(?<![\\d.])(?:${OCTET}\\.){3}${OCTET}(?!\\.?\\d)`, 'g'),
  validate: (match) => isLikelyIpv4(match)
};

export const URL_PATTERN: PiiPattern = {
  key: 'url',
  regex: /(?:https?:\/\/|www\.)[^\s<>"')]+/gi
};

export const DOMAIN_PATTERN: PiiPattern = {
  key: 'domain',
  regex: /\b(?:[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?\.)+[A-Za-z]{2,63}\b/g,
  validate: (match) => isValidHostname(match)
};

const NANP_NUMBER = '(?:\\+?1[\\s.-]?)?(?:\\([2-9]\\d{2}\\)\\s?|[2-9]\\d{2}[\\s.-]?)\\d{3}[\\s.-]?\\d{4}';
const NANP_LOCAL = '\\d{3}-\\d{4}';
const NUMBER_START = '(?<![\\w+.-])';
const NUMBER_END = '(?![\\w-])';

function phoneRegex(body: string): RegExp {
  return new RegExp(`${NUMBER_START}(?:${body})${NUMBER_END}`, 'g');
}

export const PHONE_REGION_HINTS: ReadonlyArray<PhoneRegionHint | null> = [null, 'US', 'GB', 'CA', 'AU'];

export const INTERNATIONAL_PHONE_GRAMMAR: PhoneGrammar = {
  regex: phoneRegex('\\+\\d{1,3}(?:[\\s.-]?\\(?\\d{1,4}\\)?){2,5}'),
  minDigits: 8,
  maxDigits: 15
};

export const REGIONAL_PHONE_GRAMMARS: Record<PhoneRegionHint, PhoneGrammar> = {
  US: {
    regex: phoneRegex(`${NANP_NUMBER}|${NANP_LOCAL}`),
    minDigits: 7,
    maxDigits: 11
  },
  CA: {
    regex: phoneRegex(NANP_NUMBER),
    minDigits: 10,
    maxDigits: 11
  },
  GB: {
    regex: phoneRegex('(?:\\+44[\\s-]?(?:\\(0\\)[\\s-]?)?|\\(?0)\\d{2,4}\\)?[\\s-]?\\d{3,4}[\\s-]?\\d{3,4}'),
    minDigits: 10,
    maxDigits: 12
  },
  AU: {
    regex: phoneRegex('(?:\\+61[\\s-]?|0)[2-478](?:[\\s-]?\\d){8}|\\(0[2-478]\\)[\\s-]?\\d{4}[\\s-]?\\d{4}'),
    minDigits: 10,
    maxDigits: 11
  }
};

export function phoneGrammarFor(hint: PhoneRegionHint | null): PhoneGrammar {
  return hint === null ? INTERNATIONAL_PHONE_GRAMMAR : REGIONAL_PHONE_GRAMMARS[hint];
}
