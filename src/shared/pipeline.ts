import { assembleText } from './ocr/assembler';
import { runOcr, type OcrOptions } from './ocr/tesseract';
import type { OcrToken } from './ocr/types';
import {
  detectCustomRules,
  detectDomains,
  detectEmails,
  detectFaces,
  detectIpAddresses,
  detectUrls,
  domainExclusionSpans
} from './pii/detector';
import { detectPhoneNumbers } from './pii/phone';
import { applyRedaction } from './redaction/image/engine';
import type { RasterImage, RedactionOptions } from './redaction/image/types';
import { applyTemplatePolicy } from './redaction/policy';
import { log } from './log';
import type { DetectedItem, RedactionStyle, RedactionTemplate, Region } from './types';

export interface DetectionPass {
  tokens: OcrToken[];
  items: DetectedItem[];
  regions: Region[];
}

export interface RedactImageOptions extends RedactionOptions {
  /** Skip OCR and detection; only manual regions are applied. */
  detect?: boolean;
  style?: RedactionStyle;
  manualRegions?: Region[];
  ocr?: Omit<OcrOptions, 'minConfidence'>;
}

export interface RedactImageResult extends DetectionPass {
  image: RasterImage;
}

/**
 * Detection as a caller runs it: the template's detector flags decide which
 * detectors are invoked. Email, URL and IP spans always feed the domain
 * exclusion, so a disabled type never resurfaces as a domain.
 */
export function runDetectionPass(tokens: readonly OcrToken[], template: RedactionTemplate): DetectionPass {
  if (tokens.length === 0) {
    return { tokens: [], items: [], regions: [] };
  }

  const { detectors } = template;
  const assembled = assembleText(tokens);
  const items: DetectedItem[] = [
    ...(detectors.email ? detectEmails(assembled, tokens, template.ignore) : []),
    ...(detectors.ipv4 ? detectIpAddresses(assembled, tokens) : []),
    ...(detectors.url ? detectUrls(assembled, tokens) : []),
    ...(detectors.hostname ? detectDomains(assembled, tokens, domainExclusionSpans(assembled), template.ignore) : []),
    ...(detectors.phone ? detectPhoneNumbers(assembled, tokens) : []),
    ...(detectors.face ? detectFaces() : []),
    ...detectCustomRules(assembled, tokens, template.customRules)
  ];

  return {
    tokens: [...tokens],
    items,
    regions: applyTemplatePolicy(items, template)
  };
}

export async function redactImage(
  source: Buffer | string,
  image: RasterImage,
  template: RedactionTemplate,
  options: RedactImageOptions = {}
): Promise<RedactImageResult> {
  let pass: DetectionPass = { tokens: [], items: [], regions: [] };

  if (options.detect ?? true) {
    const extraction = await runOcr(source, { ...options.ocr, minConfidence: template.ocrConfidence });
    pass = runDetectionPass(extraction.tokens, template);
    log('info', `Detected ${pass.items.length} item(s) from ${extraction.tokens.length} token(s).`, { template: template.id });
  }

  const regions = [...pass.regions, ...(options.manualRegions ?? [])];
  const redacted = await applyRedaction(image, regions, options.style ?? template.style, {
    fill: options.fill,
    blurSigma: options.blurSigma,
    blockSize: options.blockSize
  });

  return { ...pass, regions, image: redacted };
}
