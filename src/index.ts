export * from './shared/types';
export type { AssembledText, OcrToken, OcrWord } from './shared/ocr/types';
export { assembleText, tokenIndicesForSpan } from './shared/ocr/assembler';
export { getLocalOcrLangPath, normalizeTokenText, runOcr, wordsToTokens, type OcrExtraction, type OcrOptions } from './shared/ocr/tesseract';
export {
  compileCustomRule,
  detectCustomRules,
  detectDomains,
  detectEmails,
  detectFaces,
  detectIpAddresses,
  detectPii,
  detectUrls,
  domainExclusionSpans,
  type CompileResult
} from './shared/pii/detector';
export { resolveBoxes, scanPattern, type PatternMatch } from './shared/pii/matching';
export { detectPhoneNumbers, scanPhoneRegion, type PhoneScanResult } from './shared/pii/phone';
export { PHONE_REGION_HINTS, type PhoneRegionHint } from './shared/pii/patterns';
export { buildRegions, createManualRegion, mergeBoxes, parseRegionSpec } from './shared/redaction/regions';
export { applyPolicy, applyTemplatePolicy } from './shared/redaction/policy';
export { applyRedaction, clampRegion, createImageRedactionEngine } from './shared/redaction/image/engine';
export { encodeImage, loadImage, resolveOutputTarget } from './shared/redaction/image/io';
export type * from './shared/redaction/image/types';
export {
  BUILT_IN_TEMPLATES,
  getBuiltInTemplate,
  loadTemplateFile,
  parseTemplate,
  resolveTemplate,
  serializeTemplate,
  withTrustedEntries
} from './shared/template';
export { buildRedactionReceipt, summarizeRegions, type RedactionReceipt } from './shared/stats';
export { redactImage, runDetectionPass, type DetectionPass } from './shared/pipeline';
export { readRuntimeConfig, type RuntimeConfig } from './shared/config';
