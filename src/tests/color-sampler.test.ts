import { beforeEach, describe, expect, it, vi } from 'vitest';
import sharp from 'sharp';
import { ColorSampler } from '../color-sampler';
import { ImageDecodeError, InvalidRegionError } from '../errors';
import { pngFromPixels, solidPng } from './helpers/fixtures';

const A = { r: 10, g: 20, b: 30 };
const B = { r: 200, g: 180, b: 160 };

// 4x2: left half A, right half B
const halves = [A, A, B, B, A, A, B, B];

describe('ColorSampler', () => {
  let sampler: ColorSampler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    sampler = new ColorSampler();
  });

  it('returns the exact colour of a flat image', async () => {
    const colors = [
      { r: 0, g: 0, b: 0 },
      { r: 255, g: 255, b: 255 },
      { r: 255, g: 240, b: 220 },
      { r: 17, g: 128, b: 201 }
    ];
    for (const color of colors) {
      const image = await solidPng(8, 6, color);
      await expect(sampler.sample(image, 'average')).resolves.toEqual(color);
    }
  });

  it('truncates the whole-image mean per channel', async () => {
    const image = await pngFromPixels(2, 1, [
      { r: 10, g: 20, b: 30 },
      { r: 11, g: 21, b: 32 }
    ]);
    await expect(sampler.sample(image, 'average')).resolves.toEqual({ r: 10, g: 20, b: 31 });
  });

  it('averages the two halves over the whole image', async () => {
    const image = await pngFromPixels(4, 2, halves);
    await expect(sampler.sample(image, 'average')).resolves.toEqual({ r: 105, g: 100, b: 95 });
  });

  it('reads the centre pixel without aggregation', async () => {
    const black = { r: 0, g: 0, b: 0 };
    const red = { r: 255, g: 0, b: 0 };
    const image = await pngFromPixels(3, 3, [black, black, black, black, red, black, black, black, black]);
    await expect(sampler.sample(image, 'center')).resolves.toEqual(red);

    // 4x2 centre is (2, 1)
    await expect(sampler.sample(await pngFromPixels(4, 2, halves), 'center')).resolves.toEqual(B);
  });

  it('samples a single point', async () => {
    const image = await pngFromPixels(4, 2, halves);
    await expect(sampler.sample(image, 'point', { kind: 'point', x: 0, y: 1 })).resolves.toEqual(A);
    await expect(sampler.sample(image, 'point', { kind: 'point', x: 3, y: 0 })).resolves.toEqual(B);
  });

  it('averages a rectangle region', async () => {
    const image = await pngFromPixels(4, 2, halves);
    await expect(sampler.sample(image, 'rect', { kind: 'rect', x: 2, y: 0, width: 2, height: 2 })).resolves.toEqual(B);
    await expect(sampler.sample(image, 'rect', { kind: 'rect', x: 1, y: 0, width: 2, height: 1 })).resolves.toEqual({
      r: 105,
      g: 100,
      b: 95
    });
  });

  it('rejects regions outside the image', async () => {
    const image = await pngFromPixels(4, 2, halves);
    await expect(sampler.sample(image, 'rect', { kind: 'rect', x: 3, y: 0, width: 2, height: 1 })).rejects.toThrow(
      'Invalid region: (3, 0) 2x1 lies outside the 4x2 image'
    );
    await expect(sampler.sample(image, 'point', { kind: 'point', x: -1, y: 0 })).rejects.toThrow(InvalidRegionError);
    await expect(sampler.sample(image, 'point', { kind: 'point', x: 0, y: 2 })).rejects.toThrow(InvalidRegionError);
    await expect(sampler.sample(image, 'rect', { kind: 'rect', x: 0, y: 0, width: 0, height: 1 })).rejects.toThrow(
      InvalidRegionError
    );
    await expect(sampler.sample(image, 'point', { kind: 'point', x: 1.5, y: 0 })).rejects.toThrow(InvalidRegionError);
  });

  it('requires a region matching the mode', async () => {
    const image = await solidPng(2, 2, A);
    await expect(sampler.sample(image, 'point')).rejects.toThrow('Invalid region: point sampling needs a point');
    await expect(sampler.sample(image, 'rect', { kind: 'point', x: 0, y: 0 })).rejects.toThrow(InvalidRegionError);
  });

  it('ignores the alpha channel', async () => {
    const image = await sharp({ create: { width: 2, height: 2, channels: 4, background: { r: 40, g: 50, b: 60, alpha: 1 } } })
      .png()
      .toBuffer();
    await expect(sampler.sample(image, 'average')).resolves.toEqual({ r: 40, g: 50, b: 60 });
  });

  it('reports undecodable input', async () => {
    await expect(sampler.sample(Buffer.from('not an image'), 'average')).rejects.toThrow(ImageDecodeError);
    await expect(sampler.sample('/nonexistent/tooth.png', 'average')).rejects.toThrow(/Could not read image \/nonexistent\/tooth.png/);
  });
});
