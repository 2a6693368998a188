import type { DetectionSummary, PiiType, Region } from './types';

const MAX_SUMMARY_SAMPLES = 3;

export interface RedactionReceipt {
  original_file: string;
  redacted_file: string;
  template_id: string;
  pii_counts: Partial<Record<string, number>>;
  manual_regions: number;
  total_redactions: number;
  processed_at: string;
}

export interface ReceiptInput {
  originalFile: string;
  redactedFile: string;
  templateId: string;
  regions: readonly Region[];
  processedAt?: Date;
}

export function pluralTypeKey(type: PiiType): string {
  return `${type}s`;
}

export function summarizeRegions(regions: readonly Region[]): DetectionSummary[] {
  const byType = new Map<PiiType, DetectionSummary>();

  for (const region of regions) {
    if (!region.selected || region.manual || region.piiType === null) {
      continue;
    }

    const existing = byType.get(region.piiType);
    if (!existing) {
      byType.set(region.piiType, {
        type: region.piiType,
        count: 1,
        samples: [region.label]
      });
      continue;
    }

    existing.count += 1;
    if (existing.samples.length < MAX_SUMMARY_SAMPLES && !existing.samples.includes(region.label)) {
      existing.samples.push(region.label);
    }
  }

  return Array.from(byType.values());
}

export function buildRedactionReceipt(input: ReceiptInput): RedactionReceipt {
  const counts: Partial<Record<string, number>> = {};
  let manualRegions = 0;

  for (const region of input.regions) {
    if (!region.selected) {
      continue;
    }
    if (region.piiType === null) {
      manualRegions += 1;
      continue;
    }
    const key = pluralTypeKey(region.piiType);
    counts[key] = (counts[key] ?? 0) + 1;
  }

  const typedTotal = Object.values(counts).reduce<number>((sum, count) => sum + (count ?? 0), 0);

  return {
    original_file: input.originalFile,
    redacted_file: input.redactedFile,
    template_id: input.templateId,
    pii_counts: counts,
    manual_regions: manualRegions,
    total_redactions: typedTotal + manualRegions,
    processed_at: (input.processedAt ?? new Date()).toISOString()
  };
}
