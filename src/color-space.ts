import { InvalidColorError } from './errors';
import type { Lab, Rgb, Xyz } from './types';

// D65 reference white, Y normalised to 1
const REFERENCE_WHITE: Xyz = { x: 0.95047, y: 1.0, z: 1.08883 };

const EPSILON = 216 / 24389;
const KAPPA = 24389 / 27;

/**
 * Throw unless every channel is an integer in 0-255
 */
export function assertValidRgb(rgb: Rgb): void {
  for (const channel of ['r', 'g', 'b'] as const) {
    const value = rgb[channel];
    if (!Number.isInteger(value) || value < 0 || value > 255) {
      throw new InvalidColorError(`Channel ${channel} must be an integer between 0 and 255, got ${value}`);
    }
  }
}

function srgbToLinear(channel: number): number {
  const c = channel / 255;
  return c <= 0.04045 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

export function rgbToXyz(rgb: Rgb): Xyz {
  assertValidRgb(rgb);
  const r = srgbToLinear(rgb.r);
  const g = srgbToLinear(rgb.g);
  const b = srgbToLinear(rgb.b);

  return {
    x: r * 0.4124 + g * 0.3576 + b * 0.1805,
    y: r * 0.2126 + g * 0.7152 + b * 0.0722,
    z: r * 0.0193 + g * 0.1192 + b * 0.9505
  };
}

function labCompand(t: number): number {
  return t > EPSILON ? Math.cbrt(t) : (KAPPA * t + 16) / 116;
}

export function xyzToLab(xyz: Xyz): Lab {
  const fx = labCompand(xyz.x / REFERENCE_WHITE.x);
  const fy = labCompand(xyz.y / REFERENCE_WHITE.y);
  const fz = labCompand(xyz.z / REFERENCE_WHITE.z);

  return {
    L: 116 * fy - 16,
    a: 500 * (fx - fy),
    b: 200 * (fy - fz)
  };
}

export function rgbToLab(rgb: Rgb): Lab {
  return xyzToLab(rgbToXyz(rgb));
}

/**
 * CIE76 colour difference: Euclidean distance in Lab
 */
export function deltaE76(lab1: Lab, lab2: Lab): number {
  const dL = lab1.L - lab2.L;
  const da = lab1.a - lab2.a;
  const db = lab1.b - lab2.b;
  return Math.sqrt(dL * dL + da * da + db * db);
}

export function rgbToHex(rgb: Rgb): string {
  return `#${((1 << 24) + (rgb.r << 16) + (rgb.g << 8) + rgb.b).toString(16).slice(1).toUpperCase()}`;
}

export function formatRgb(rgb: Rgb): string {
  return `rgb(${rgb.r}, ${rgb.g}, ${rgb.b})`;
}
