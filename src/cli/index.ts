#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { readRuntimeConfig } from '../shared/config';
import { LOG_LEVEL_ENV, log } from '../shared/log';
import { runDetectionPass, redactImage } from '../shared/pipeline';
import { runOcr } from '../shared/ocr/tesseract';
import { encodeImage, loadImage, resolveOutputTarget } from '../shared/redaction/image/io';
import { parseRegionSpec } from '../shared/redaction/regions';
import { buildRedactionReceipt, summarizeRegions } from '../shared/stats';
import { resolveTemplate, withTrustedEntries } from '../shared/template';
import { describePiiType, type RedactionStyle } from '../shared/types';

const USAGE = `Usage:
  shotveil scan --input <image> [--template <id|file>] [--trusted <entry>]...
  shotveil redact --input <image> --output <file> [--style solid|blur|pixelate]
                  [--template <id|file>] [--trusted <entry>]... [--region x,y,w,h]...
                  [--no-auto] [--receipt <file>]

Options:
  --verbose   Log debug output (same as ${LOG_LEVEL_ENV}=debug).`;

const STYLES: readonly RedactionStyle[] = ['solid', 'blur', 'pixelate'];

function parseStyle(raw: string | undefined): RedactionStyle | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  const style = STYLES.find((candidate) => candidate === normalized);
  if (!style) {
    throw new Error(`Unknown style "${raw}". Expected one of: ${STYLES.join(', ')}.`);
  }
  return style;
}

function requireOption(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`--${name} is required.\n\n${USAGE}`);
  }
  return value;
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      style: { type: 'string', short: 's' },
      template: { type: 'string', short: 't' },
      trusted: { type: 'string', multiple: true },
      region: { type: 'string', multiple: true },
      'no-auto': { type: 'boolean' },
      receipt: { type: 'string' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

type CliValues = ReturnType<typeof parseCli>['values'];

async function scanCommand(values: CliValues): Promise<void> {
  const input = requireOption(values.input, 'input');
  const config = readRuntimeConfig();
  const template = withTrustedEntries(await resolveTemplate(values.template), values.trusted ?? []);

  const extraction = await runOcr(input, {
    minConfidence: template.ocrConfidence,
    langPath: config.ocrLangPath,
    timeoutMs: config.ocrTimeoutMs
  });
  const pass = runDetectionPass(extraction.tokens, template);

  const detections = pass.items.map((item, index) => {
    const region = pass.regions[index];
    return {
      type: item.piiType,
      text: item.matchedText,
      region: region ? { x: region.x, y: region.y, w: region.w, h: region.h } : null,
      selected: region?.selected ?? false
    };
  });

  console.log(JSON.stringify(detections, null, 2));
}

async function redactCommand(values: CliValues): Promise<void> {
  const input = requireOption(values.input, 'input');
  const output = requireOption(values.output, 'output');
  const config = readRuntimeConfig();
  const template = withTrustedEntries(await resolveTemplate(values.template), values.trusted ?? []);
  const style = parseStyle(values.style) ?? template.style;
  const manualRegions = (values.region ?? []).map((spec) => parseRegionSpec(spec));
  const detect = !values['no-auto'];

  console.log(`Loading image: ${input}`);
  const image = await loadImage(input);
  console.log(`Image loaded: ${image.width}x${image.height} pixels`);

  if (detect) {
    console.log(`Running detection with template "${template.name}"...`);
  } else {
    console.log('Automatic detection disabled; only manual regions are applied.');
  }

  const result = await redactImage(input, image, template, {
    detect,
    style,
    manualRegions,
    ocr: { langPath: config.ocrLangPath, timeoutMs: config.ocrTimeoutMs }
  });

  const summary = summarizeRegions(result.regions);
  for (const entry of summary) {
    console.log(`  - ${describePiiType(entry.type)}: ${entry.count}`);
  }

  const target = resolveOutputTarget(output, template.export.format);
  await mkdir(path.dirname(path.resolve(target.path)), { recursive: true });
  await writeFile(target.path, await encodeImage(result.image, target.format));

  const selectedCount = result.regions.filter((region) => region.selected).length;
  console.log(`Saved ${style} redaction of ${selectedCount} region(s) to ${target.path}`);

  if (values.receipt) {
    const receipt = buildRedactionReceipt({
      originalFile: path.basename(input),
      redactedFile: path.basename(target.path),
      templateId: template.id,
      regions: result.regions
    });
    await writeFile(values.receipt, `${JSON.stringify(receipt, null, 2)}\n`, 'utf-8');
    console.log(`Receipt written to ${values.receipt}`);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const { values, positionals } = parseCli(argv);

    if (values.verbose) {
      process.env[LOG_LEVEL_ENV] = 'debug';
    }

    const command = positionals[0];
    if (values.help || !command) {
      console.log(USAGE);
      return values.help ? 0 : 1;
    }

    switch (command) {
      case 'scan':
        await scanCommand(values);
        return 0;
      case 'redact':
        await redactCommand(values);
        return 0;
      default:
        throw new Error(`Unknown command "${command}".\n\n${USAGE}`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log('debug', 'Command failed.', error instanceof Error ? error.stack : message);
    console.error(`Error: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
