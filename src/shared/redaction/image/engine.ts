import sharp from 'sharp';
import type { Region, RedactionStyle } from '../../types';
import type {
	FillColor,
	ImageRedactionEngine,
	PixelRect,
	RasterImage,
	RedactionOptions,
	RedactionPlan,
	RedactionResult,
	RedactionTarget
} from './types';

export const DEFAULT_BLUR_SIGMA = 15;
export const DEFAULT_PIXEL_BLOCK_SIZE = 10;
export const DEFAULT_FILL: FillColor = { r: 0, g: 0, b: 0, alpha: 255 };

export function clampRegion(region: Region, width: number, height: number): PixelRect | null {
	if (region.w <= 0 || region.h <= 0) {
		return null;
	}

	const left = Math.max(0, region.x);
	const top = Math.max(0, region.y);
	const right = Math.min(width, region.x + region.w);
	const bottom = Math.min(height, region.y + region.h);

	if (left >= width || top >= height || right <= left || bottom <= top) {
		return null;
	}

	return { left, top, width: right - left, height: bottom - top };
}

function buildTargets(regions: readonly Region[], width: number, height: number): RedactionTarget[] {
	return regions.map((region) => {
		if (!region.selected) {
			return { region, rect: null, skipped: 'unselected' };
		}

		if (region.w <= 0 || region.h <= 0) {
			return { region, rect: null, skipped: 'empty' };
		}

		const rect = clampRegion(region, width, height);
		return rect ? { region, rect, skipped: null } : { region, rect: null, skipped: 'outside' };
	});
}

function fillPixel(fill: FillColor, channels: RasterImage['channels']): number[] {
	switch (channels) {
		case 1:
			return [fill.r];
		case 2:
			return [fill.r, fill.alpha];
		case 3:
			return [fill.r, fill.g, fill.b];
		case 4:
			return [fill.r, fill.g, fill.b, fill.alpha];
	}
}

function fillRect(target: Buffer, image: RasterImage, rect: PixelRect, fill: FillColor): void {
	const pixel = fillPixel(fill, image.channels);
	for (let row = rect.top; row < rect.top + rect.height; row += 1) {
		for (let column = rect.left; column < rect.left + rect.width; column += 1) {
			const offset = (row * image.width + column) * image.channels;
			pixel.forEach((value, channel) => {
				target[offset + channel] = value;
			});
		}
	}
}

function writePatch(target: Buffer, image: RasterImage, rect: PixelRect, patch: Buffer): void {
	const rowBytes = rect.width * image.channels;
	for (let row = 0; row < rect.height; row += 1) {
		const sourceStart = row * rowBytes;
		const targetStart = ((rect.top + row) * image.width + rect.left) * image.channels;
		patch.copy(target, targetStart, sourceStart, sourceStart + rowBytes);
	}
}

function rawInput(data: Buffer, width: number, height: number, channels: RasterImage['channels']): sharp.Sharp {
	return sharp(data, { raw: { width, height, channels } });
}

async function readRaw(pipeline: sharp.Sharp, expected: { width: number; height: number; channels: number }, label: string): Promise<Buffer> {
	const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
	if (info.width !== expected.width || info.height !== expected.height || info.channels !== expected.channels) {
		throw new Error(
			`${label} produced ${info.width}x${info.height}x${info.channels}, expected ${expected.width}x${expected.height}x${expected.channels}.`
		);
	}
	return data;
}

async function blurPatch(working: Buffer, image: RasterImage, rect: PixelRect, sigma: number): Promise<Buffer> {
	return readRaw(
		rawInput(working, image.width, image.height, image.channels).extract(rect).blur(sigma),
		{ width: rect.width, height: rect.height, channels: image.channels },
		'Blur'
	);
}

async function pixelatePatch(working: Buffer, image: RasterImage, rect: PixelRect, blockSize: number): Promise<Buffer> {
	const smallWidth = Math.max(1, Math.floor(rect.width / blockSize));
	const smallHeight = Math.max(1, Math.floor(rect.height / blockSize));

	const small = await readRaw(
		rawInput(working, image.width, image.height, image.channels)
			.extract(rect)
			.resize(smallWidth, smallHeight, { kernel: 'nearest', fit: 'fill' }),
		{ width: smallWidth, height: smallHeight, channels: image.channels },
		'Pixelate downsample'
	);

	return readRaw(
		rawInput(small, smallWidth, smallHeight, image.channels).resize(rect.width, rect.height, { kernel: 'nearest', fit: 'fill' }),
		{ width: rect.width, height: rect.height, channels: image.channels },
		'Pixelate upsample'
	);
}

function describeRect(rect: PixelRect): string {
	return `${rect.left},${rect.top} ${rect.width}x${rect.height}`;
}

function validateOptions(options: RedactionOptions): Required<RedactionOptions> {
	const blurSigma = options.blurSigma ?? DEFAULT_BLUR_SIGMA;
	const blockSize = options.blockSize ?? DEFAULT_PIXEL_BLOCK_SIZE;

	if (!(blurSigma >= 0.3 && blurSigma <= 1000)) {
		throw new Error(`Blur sigma must be between 0.3 and 1000, received ${blurSigma}.`);
	}
	if (!Number.isInteger(blockSize) || blockSize < 1) {
		throw new Error(`Pixel block size must be a positive integer, received ${blockSize}.`);
	}

	return { fill: options.fill ?? DEFAULT_FILL, blurSigma, blockSize };
}

class RasterRedactionEngine implements ImageRedactionEngine {
	private readonly options: Required<RedactionOptions>;

	constructor(options: RedactionOptions) {
		this.options = validateOptions(options);
	}

	buildPlan(regions: readonly Region[], width: number, height: number, style: RedactionStyle): RedactionPlan {
		const targets = buildTargets(regions, width, height);
		const redactableCount = targets.reduce((count, target) => count + (target.rect ? 1 : 0), 0);

		return { style, targets, redactableCount };
	}

	async applyPlan(image: RasterImage, plan: RedactionPlan): Promise<RedactionResult> {
		const working = Buffer.from(image.data);

		if (plan.redactableCount === 0) {
			return {
				image: { ...image, data: working },
				redactedCount: 0,
				message: 'No selected regions intersect the image. Pixels kept unchanged.'
			};
		}

		let redactedCount = 0;
		for (const target of plan.targets) {
			if (!target.rect) {
				continue;
			}

			await this.redactRect(working, image, target.rect, plan.style);
			redactedCount += 1;
		}

		return {
			image: { ...image, data: working },
			redactedCount,
			message: `Applied ${plan.style} redaction to ${redactedCount} region(s).`
		};
	}

	private async redactRect(working: Buffer, image: RasterImage, rect: PixelRect, style: RedactionStyle): Promise<void> {
		try {
			switch (style) {
				case 'solid':
					fillRect(working, image, rect, this.options.fill);
					return;
				case 'blur':
					writePatch(working, image, rect, await blurPatch(working, image, rect, this.options.blurSigma));
					return;
				case 'pixelate':
					writePatch(working, image, rect, await pixelatePatch(working, image, rect, this.options.blockSize));
					return;
				default: {
					const unreachable: never = style;
					throw new Error(`Unknown redaction style: ${String(unreachable)}`);
				}
			}
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			throw new Error(`${style} redaction failed at ${describeRect(rect)}: ${reason}`);
		}
	}
}

export function createImageRedactionEngine(options: RedactionOptions = {}): ImageRedactionEngine {
	return new RasterRedactionEngine(options);
}

export async function applyRedaction(
	image: RasterImage,
	regions: readonly Region[],
	style: RedactionStyle,
	options: RedactionOptions = {}
): Promise<RasterImage> {
	const engine = createImageRedactionEngine(options);
	const plan = engine.buildPlan(regions, image.width, image.height, style);
	const result = await engine.applyPlan(image, plan);
	return result.image;
}
