import { assembleText } from '../ocr/assembler';
import type { AssembledText, OcrToken } from '../ocr/types';
import { log } from '../log';
import {
  emptyDetectionPolicy,
  type CustomRule,
  type DetectedItem,
  type DetectionPolicy,
  type IgnoreLists,
  type TextSpan
} from '../types';
import { scanPattern, toDetectedItem, type PatternMatch } from './matching';
import { DOMAIN_PATTERN, EMAIL_PATTERN, IPV4_PATTERN, URL_PATTERN, type PiiPattern } from './patterns';
import { detectPhoneNumbers } from './phone';

export type CompileResult =
  | { ok: true; regex: RegExp }
  | { ok: false; error: string };

function detectWithPattern(
  pattern: PiiPattern,
  assembled: AssembledText,
  tokens: readonly OcrToken[],
  skip?: (match: PatternMatch) => boolean
): DetectedItem[] {
  const items: DetectedItem[] = [];

  for (const match of scanPattern(assembled.text, pattern.regex, pattern.validate)) {
    if (skip && skip(match)) {
      continue;
    }

    const item = toDetectedItem(pattern.key, match, assembled, tokens);
    if (item) {
      items.push(item);
    }
  }

  return items;
}

export function detectEmails(assembled: AssembledText, tokens: readonly OcrToken[], ignore: IgnoreLists): DetectedItem[] {
  const ignoredEmails = new Set(ignore.emails);
  const ignoredDomains = new Set(ignore.domains);

  return detectWithPattern(EMAIL_PATTERN, assembled, tokens, (match) => {
    const domain = match.value.slice(match.value.indexOf('@') + 1);
    return ignoredEmails.has(match.value) || ignoredDomains.has(domain);
  });
}

export function detectIpAddresses(assembled: AssembledText, tokens: readonly OcrToken[]): DetectedItem[] {
  return detectWithPattern(IPV4_PATTERN, assembled, tokens);
}

export function detectUrls(assembled: AssembledText, tokens: readonly OcrToken[]): DetectedItem[] {
  return detectWithPattern(URL_PATTERN, assembled, tokens);
}

/**
 * Spans of every email, URL and IP match in the text, ignored ones included.
 * An ignored `bob@example.com` must not resurface as the domain `example.com`.
 */
export function domainExclusionSpans(assembled: AssembledText): TextSpan[] {
  return [EMAIL_PATTERN, URL_PATTERN, IPV4_PATTERN].flatMap((pattern) =>
    scanPattern(assembled.text, pattern.regex, pattern.validate).map(({ start, end }) => ({ start, end })));
}

/**
 * Standalone hostnames. A match sharing any character with one of the
 * `exclusions` spans is dropped as a whole.
 */
export function detectDomains(
  assembled: AssembledText,
  tokens: readonly OcrToken[],
  exclusions: readonly TextSpan[],
  ignore: IgnoreLists
): DetectedItem[] {
  const occupied = new Set<number>();
  for (const span of exclusions) {
    for (let position = span.start; position < span.end; position += 1) {
      occupied.add(position);
    }
  }
  const ignoredDomains = new Set(ignore.domains);

  return detectWithPattern(DOMAIN_PATTERN, assembled, tokens, (match) => {
    for (let position = match.start; position < match.end; position += 1) {
      if (occupied.has(position)) {
        return true;
      }
    }
    return ignoredDomains.has(match.value);
  });
}

export function compileCustomRule(rule: CustomRule): CompileResult {
  try {
    return { ok: true, regex: new RegExp(rule.pattern, 'g') };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function detectCustomRules(
  assembled: AssembledText,
  tokens: readonly OcrToken[],
  rules: readonly CustomRule[]
): DetectedItem[] {
  const items: DetectedItem[] = [];

  for (const rule of rules) {
    const compiled = compileCustomRule(rule);
    if (!compiled.ok) {
      log('warn', `Skipping custom rule "${rule.name}": invalid pattern.`, { pattern: rule.pattern, error: compiled.error });
      continue;
    }

    for (const match of scanPattern(assembled.text, compiled.regex)) {
      const item = toDetectedItem('custom', match, assembled, tokens, rule.name);
      if (item) {
        items.push(item);
      }
    }
  }

  return items;
}

// Face detection is reserved; no detector is wired to the type yet.
export function detectFaces(): DetectedItem[] {
  return [];
}

export function detectPii(tokens: readonly OcrToken[], policy: DetectionPolicy = emptyDetectionPolicy): DetectedItem[] {
  if (tokens.length === 0) {
    return [];
  }

  const assembled = assembleText(tokens);
  const emails = detectEmails(assembled, tokens, policy.ignore);
  const ips = detectIpAddresses(assembled, tokens);
  const urls = detectUrls(assembled, tokens);
  const domains = detectDomains(assembled, tokens, domainExclusionSpans(assembled), policy.ignore);
  const phones = detectPhoneNumbers(assembled, tokens);
  const custom = detectCustomRules(assembled, tokens, policy.customRules);

  return [...emails, ...ips, ...urls, ...domains, ...phones, ...custom];
}
