import type { Region, RedactionStyle } from '../../types';

export type RasterChannels = 1 | 2 | 3 | 4;

export interface RasterImage {
	data: Buffer;
	width: number;
	height: number;
	channels: RasterChannels;
}

export interface PixelRect {
	left: number;
	top: number;
	width: number;
	height: number;
}

export interface FillColor {
	r: number;
	g: number;
	b: number;
	alpha: number;
}

export interface RedactionOptions {
	fill?: FillColor;
	blurSigma?: number;
	blockSize?: number;
}

export type RedactionSkipReason = 'unselected' | 'empty' | 'outside';

export interface RedactionTarget {
	region: Region;
	rect: PixelRect | null;
	skipped: RedactionSkipReason | null;
}

export interface RedactionPlan {
	style: RedactionStyle;
	targets: RedactionTarget[];
	redactableCount: number;
}

export interface RedactionResult {
	image: RasterImage;
	redactedCount: number;
	message: string;
}

export interface ImageRedactionEngine {
	buildPlan(regions: readonly Region[], width: number, height: number, style: RedactionStyle): RedactionPlan;
	applyPlan(image: RasterImage, plan: RedactionPlan): Promise<RedactionResult>;
}
