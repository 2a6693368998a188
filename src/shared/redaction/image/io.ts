import path from 'node:path';
import sharp from 'sharp';
import { MAX_IMAGE_PIXELS } from '../../file/security';
import type { ExportFormat } from '../../types';
import type { RasterChannels, RasterImage } from './types';

export type EncodedFormat = 'png' | 'jpeg';

const JPEG_EXTENSIONS = new Set(['.jpg', '.jpeg']);

function isRasterChannels(value: number): value is RasterChannels {
	return value === 1 || value === 2 || value === 3 || value === 4;
}

export async function loadImage(input: string | Buffer): Promise<RasterImage> {
	const { data, info } = await sharp(input, { limitInputPixels: MAX_IMAGE_PIXELS })
		.raw()
		.toBuffer({ resolveWithObject: true });

	if (!isRasterChannels(info.channels)) {
		throw new Error(`Unsupported channel count ${info.channels} in decoded image.`);
	}

	return { data, width: info.width, height: info.height, channels: info.channels };
}

/** Re-encodes from raw pixels, so no source metadata survives. */
export async function encodeImage(image: RasterImage, format: EncodedFormat): Promise<Buffer> {
	const pipeline = sharp(image.data, {
		raw: { width: image.width, height: image.height, channels: image.channels }
	});

	if (format === 'jpeg') {
		return pipeline.flatten({ background: '#ffffff' }).jpeg({ quality: 92 }).toBuffer();
	}

	return pipeline.png().toBuffer();
}

export function resolveOutputTarget(outputPath: string, exportFormat: ExportFormat): { path: string; format: EncodedFormat } {
	const extension = path.extname(outputPath).toLowerCase();

	if (exportFormat === 'original' && JPEG_EXTENSIONS.has(extension)) {
		return { path: outputPath, format: 'jpeg' };
	}

	// Anything not written as JPEG is PNG, and the file name says so.
	const pngPath = extension === '.png' ? outputPath : `${outputPath.slice(0, outputPath.length - extension.length)}.png`;
	return { path: pngPath, format: 'png' };
}
