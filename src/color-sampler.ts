import sharp from 'sharp';
import { formatRgb } from './color-space';
import { ImageDecodeError, InvalidRegionError } from './errors';
import type { Rgb, SampleRegion, SamplingMode } from './types';

export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export class ColorSampler {
  private debugMode: boolean;

  constructor(debugMode: boolean = false) {
    this.debugMode = debugMode;
  }

  /**
   * Reduce an image to a single representative colour
   */
  async sample(input: string | Buffer, mode: SamplingMode, region?: SampleRegion): Promise<Rgb> {
    const image = await this.decode(input);
    console.log(`📐 Image dimensions: ${image.width}x${image.height}`);

    const rect = ColorSampler.resolveSampleRect(image, mode, region);
    if (this.debugMode) {
      console.log(`🔍 Sampling mode "${mode}" over (${rect.x}, ${rect.y}) ${rect.width}x${rect.height}`);
    }

    const color = ColorSampler.averageRect(image, rect);
    console.log(`🎨 Sampled colour: ${formatRgb(color)}`);
    return color;
  }

  /**
   * Decode to raw 8-bit sRGB without alpha
   */
  async decode(input: string | Buffer): Promise<DecodedImage> {
    try {
      const { data, info } = await sharp(input)
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });

      return { data, width: info.width, height: info.height, channels: info.channels };
    } catch (error) {
      const source = typeof input === 'string' ? input : 'uploaded buffer';
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageDecodeError(`Could not read image ${source}: ${reason}`, error);
    }
  }

  /**
   * Turn a sampling mode into the pixel rectangle to average
   */
  static resolveSampleRect(
    image: Pick<DecodedImage, 'width' | 'height'>,
    mode: SamplingMode,
    region?: SampleRegion
  ): PixelRect {
    switch (mode) {
      case 'average':
        return { x: 0, y: 0, width: image.width, height: image.height };
      case 'center':
        return { x: Math.floor(image.width / 2), y: Math.floor(image.height / 2), width: 1, height: 1 };
      case 'point':
        if (region?.kind !== 'point') {
          throw new InvalidRegionError('point sampling needs a point');
        }
        return ColorSampler.checkBounds(image, { x: region.x, y: region.y, width: 1, height: 1 });
      case 'rect':
        if (region?.kind !== 'rect') {
          throw new InvalidRegionError('rectangle sampling needs a rectangle');
        }
        return ColorSampler.checkBounds(image, region);
    }
  }

  private static checkBounds(image: Pick<DecodedImage, 'width' | 'height'>, rect: PixelRect): PixelRect {
    const { x, y, width, height } = rect;
    if (![x, y, width, height].every(Number.isInteger)) {
      throw new InvalidRegionError(`coordinates must be whole pixels, got (${x}, ${y}) ${width}x${height}`);
    }
    if (width < 1 || height < 1) {
      throw new InvalidRegionError(`size must be at least 1x1, got ${width}x${height}`);
    }
    if (x < 0 || y < 0 || x + width > image.width || y + height > image.height) {
      throw new InvalidRegionError(
        `(${x}, ${y}) ${width}x${height} lies outside the ${image.width}x${image.height} image`
      );
    }
    return { x, y, width, height };
  }

  /**
   * Per-channel arithmetic mean over a rectangle, truncated to integers
   */
  static averageRect(image: DecodedImage, rect: PixelRect): Rgb {
    let totalR = 0;
    let totalG = 0;
    let totalB = 0;

    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        const pixelIndex = (y * image.width + x) * image.channels;
        totalR += image.data[pixelIndex];
        totalG += image.data[pixelIndex + 1];
        totalB += image.data[pixelIndex + 2];
      }
    }

    const pixelCount = rect.width * rect.height;
    return {
      r: Math.floor(totalR / pixelCount),
      g: Math.floor(totalG / pixelCount),
      b: Math.floor(totalB / pixelCount)
    };
  }
}
