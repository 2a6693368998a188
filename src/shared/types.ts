export const PII_TYPES = ['email', 'ip', 'domain', 'url', 'phone', 'face', 'custom'] as const;

export type PiiType = (typeof PII_TYPES)[number];

export type RedactionStyle = 'solid' | 'blur' | 'pixelate';

export interface Box {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Half-open character span in the assembled text. */
export interface TextSpan {
  start: number;
  end: number;
}

export interface DetectedItem {
  piiType: PiiType;
  /** Literal match, or the rule name for custom rules. */
  matchedText: string;
  boxes: Box[];
  hasQueryParams: boolean;
  span: TextSpan;
}

export interface Region extends Box {
  piiType: PiiType | null;
  label: string;
  selected: boolean;
  manual: boolean;
}

export interface IgnoreLists {
  emails: string[];
  domains: string[];
}

export interface CustomRule {
  name: string;
  pattern: string;
}

export interface DetectionPolicy {
  ignore: IgnoreLists;
  customRules: CustomRule[];
}

export interface SelectionPolicy {
  flagQueryParamsOnly: boolean;
}

export interface DetectorFlags {
  email: boolean;
  phone: boolean;
  ipv4: boolean;
  hostname: boolean;
  url: boolean;
  face: boolean;
}

export type ExportFormat = 'png' | 'original';

export interface RedactionTemplate extends DetectionPolicy, SelectionPolicy {
  id: string;
  name: string;
  version: number;
  detectors: DetectorFlags;
  style: RedactionStyle;
  ocrConfidence: number;
  export: {
    format: ExportFormat;
  };
}

export interface DetectionSummary {
  type: PiiType;
  count: number;
  samples: string[];
}

export const emptyDetectionPolicy: DetectionPolicy = {
  ignore: { emails: [], domains: [] },
  customRules: []
};

export function describePiiType(type: PiiType): string {
  switch (type) {
    case 'email':
      return 'Email Address';
    case 'ip':
      return 'IP Address';
    case 'domain':
      return 'Domain';
    case 'url':
      return 'URL';
    case 'phone':
      return 'Phone Number';
    case 'face':
      return 'Face';
    case 'custom':
      return 'Custom Rule';
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}
