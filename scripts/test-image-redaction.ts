import assert from 'node:assert/strict';
import { applyRedaction, clampRegion, createImageRedactionEngine } from '../src/shared/redaction/image/engine';
import { encodeImage, loadImage, resolveOutputTarget } from '../src/shared/redaction/image/io';
import type { RasterChannels, RasterImage } from '../src/shared/redaction/image/types';
import { createManualRegion } from '../src/shared/redaction/regions';
import type { Region } from '../src/shared/types';

function createRaster(width: number, height: number, channels: RasterChannels, value: number): RasterImage {
	return { data: Buffer.alloc(width * height * channels, value), width, height, channels };
}

function pixelAt(image: RasterImage, x: number, y: number): number[] {
	const offset = (y * image.width + x) * image.channels;
	return Array.from(image.data.subarray(offset, offset + image.channels));
}

function setPixel(image: RasterImage, x: number, y: number, values: number[]): void {
	const offset = (y * image.width + x) * image.channels;
	values.forEach((value, channel) => {
		image.data[offset + channel] = value;
	});
}

function region(x: number, y: number, w: number, h: number, selected = true): Region {
	return { ...createManualRegion(x, y, w, h), selected };
}

function inside(x: number, y: number, r: Region): boolean {
	return x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h;
}

let checks = 0;

async function runSolidTests(): Promise<void> {
	const source = createRaster(100, 100, 3, 255);
	const target = region(25, 25, 50, 50);
	const redacted = await applyRedaction(source, [target], 'solid');

	let mismatches = 0;
	for (let y = 0; y < 100; y += 1) {
		for (let x = 0; x < 100; x += 1) {
			const expected = inside(x, y, target) ? [0, 0, 0] : [255, 255, 255];
			if (pixelAt(redacted, x, y).some((value, channel) => value !== expected[channel])) {
				mismatches += 1;
			}
		}
	}
	assert.equal(mismatches, 0, 'solid fill covers exactly the region');
	assert.deepEqual(pixelAt(redacted, 75, 75), [255, 255, 255]);
	assert(source.data.every((value) => value === 255), 'source raster is never mutated');
	checks += 3;

	const rgba = createRaster(4, 4, 4, 255);
	const tinted = await applyRedaction(rgba, [region(0, 0, 2, 2)], 'solid', { fill: { r: 255, g: 0, b: 0, alpha: 128 } });
	assert.deepEqual(pixelAt(tinted, 1, 1), [255, 0, 0, 128]);
	assert.deepEqual(pixelAt(tinted, 2, 2), [255, 255, 255, 255]);
	checks += 2;

	const gray = createRaster(4, 4, 1, 200);
	const grayOut = await applyRedaction(gray, [region(0, 0, 1, 1)], 'solid');
	assert.deepEqual(pixelAt(grayOut, 0, 0), [0]);
	assert.deepEqual(pixelAt(grayOut, 1, 0), [200]);
	checks += 2;
}

async function runSkipTests(): Promise<void> {
	const source = createRaster(100, 100, 3, 255);

	for (const style of ['solid', 'blur', 'pixelate'] as const) {
		const untouched = await applyRedaction(source, [region(25, 25, 50, 50, false)], style);
		assert(untouched.data.equals(source.data), `unselected region left pixels unchanged under ${style}`);
		assert.notEqual(untouched.data, source.data, 'result is a copy');
		checks += 2;
	}

	const degenerate = await applyRedaction(source, [region(10, 10, 0, 10), region(10, 10, 10, -5), region(200, 200, 10, 10)], 'solid');
	assert(degenerate.data.equals(source.data));
	checks += 1;

	const clipped = await applyRedaction(source, [region(90, 90, 50, 50)], 'solid');
	assert.deepEqual(pixelAt(clipped, 99, 99), [0, 0, 0]);
	assert.deepEqual(pixelAt(clipped, 89, 99), [255, 255, 255]);
	checks += 2;

	const small = createRaster(10, 10, 3, 255);
	const covered = await applyRedaction(small, [region(-10, -10, 20, 20)], 'solid');
	assert(covered.data.every((value) => value === 0), 'region larger than the image covers all of it');
	checks += 1;

	assert.deepEqual(clampRegion(region(-5, 5, 20, 10), 10, 10), { left: 0, top: 5, width: 10, height: 5 });
	assert.equal(clampRegion(region(10, 0, 5, 5), 10, 10), null);
	assert.equal(clampRegion(region(0, 0, 0, 5), 10, 10), null);
	checks += 3;

	const engine = createImageRedactionEngine();
	const plan = engine.buildPlan([
		region(0, 0, 10, 10, false),
		region(0, 0, 0, 10),
		region(500, 500, 10, 10),
		region(5, 5, 10, 10)
	], 100, 100, 'solid');
	assert.deepEqual(plan.targets.map((target) => target.skipped), ['unselected', 'empty', 'outside', null]);
	assert.equal(plan.redactableCount, 1);
	assert.deepEqual(Object.keys(plan).sort(), ['redactableCount', 'style', 'targets']);
	checks += 3;

	const emptyResult = await engine.applyPlan(source, engine.buildPlan([], 100, 100, 'blur'));
	assert.equal(emptyResult.redactedCount, 0);
	assert.equal(emptyResult.message, 'No selected regions intersect the image. Pixels kept unchanged.');
	const applied = await engine.applyPlan(source, plan);
	assert.equal(applied.message, 'Applied solid redaction to 1 region(s).');
	checks += 3;
}

async function runBlurTests(): Promise<void> {
	const source = createRaster(100, 100, 3, 255);
	for (let y = 40; y <= 60; y += 1) {
		for (let x = 40; x <= 60; x += 1) {
			setPixel(source, x, y, [0, 0, 0]);
		}
	}

	const blurred = await applyRedaction(source, [region(25, 25, 50, 50)], 'blur');
	const edge = pixelAt(blurred, 40, 50);
	assert.notDeepEqual(edge, [0, 0, 0], 'edge of the dark square is softened');
	assert.notDeepEqual(edge, [255, 255, 255]);
	assert.deepEqual(pixelAt(blurred, 1, 1), [255, 255, 255]);
	assert.deepEqual(pixelAt(blurred, 80, 80), [255, 255, 255]);
	checks += 4;
}

async function runPixelateTests(): Promise<void> {
	const source = createRaster(30, 20, 3, 0);
	for (let y = 0; y < 20; y += 1) {
		for (let x = 0; x < 30; x += 1) {
			const value = (x * 7 + y * 3) % 256;
			setPixel(source, x, y, [value, value, value]);
		}
	}

	const pixelated = await applyRedaction(source, [region(0, 0, 20, 20)], 'pixelate', { blockSize: 10 });

	for (const [blockX, blockY] of [[0, 0], [10, 0], [0, 10], [10, 10]] as const) {
		const reference = pixelAt(pixelated, blockX, blockY);
		for (let y = blockY; y < blockY + 10; y += 1) {
			for (let x = blockX; x < blockX + 10; x += 1) {
				assert.deepEqual(pixelAt(pixelated, x, y), reference, `block at ${blockX},${blockY} is uniform`);
			}
		}
		checks += 1;
	}

	let outsideChanged = 0;
	for (let y = 0; y < 20; y += 1) {
		for (let x = 20; x < 30; x += 1) {
			if (pixelAt(pixelated, x, y).some((value, channel) => value !== pixelAt(source, x, y)[channel])) {
				outsideChanged += 1;
			}
		}
	}
	assert.equal(outsideChanged, 0);
	checks += 1;

	assert.throws(() => createImageRedactionEngine({ blockSize: 0 }), /Pixel block size must be a positive integer/);
	assert.throws(() => createImageRedactionEngine({ blurSigma: 0.1 }), /Blur sigma must be between 0.3 and 1000/);
	checks += 2;
}

async function runIoTests(): Promise<void> {
	const source = createRaster(2, 2, 3, 0);
	setPixel(source, 1, 0, [255, 0, 0]);
	setPixel(source, 0, 1, [0, 255, 0]);

	const decoded = await loadImage(await encodeImage(source, 'png'));
	assert.equal(decoded.width, 2);
	assert.equal(decoded.height, 2);
	assert.equal(decoded.channels, 3);
	assert(decoded.data.equals(source.data), 'png keeps pixels exactly');
	checks += 4;

	assert.deepEqual(resolveOutputTarget('out/shot.jpg', 'png'), { path: 'out/shot.png', format: 'png' });
	assert.deepEqual(resolveOutputTarget('out/shot.PNG', 'png'), { path: 'out/shot.PNG', format: 'png' });
	assert.deepEqual(resolveOutputTarget('out/shot', 'png'), { path: 'out/shot.png', format: 'png' });
	assert.deepEqual(resolveOutputTarget('out/shot.jpeg', 'original'), { path: 'out/shot.jpeg', format: 'jpeg' });
	assert.deepEqual(resolveOutputTarget('out/shot.webp', 'original'), { path: 'out/shot.png', format: 'png' });
	assert.deepEqual(resolveOutputTarget('out/shot.png', 'original'), { path: 'out/shot.png', format: 'png' });
	assert.deepEqual(resolveOutputTarget('out/shot.JPG', 'png'), { path: 'out/shot.png', format: 'png' });
	checks += 7;
}

async function main(): Promise<void> {
	await runSolidTests();
	await runSkipTests();
	await runBlurTests();
	await runPixelateTests();
	await runIoTests();

	console.log(`✅ Image redaction tests passed (${checks} checks).`);
}

void main();
