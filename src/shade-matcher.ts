import { deltaE76, formatRgb, rgbToHex, rgbToLab } from './color-space';
import { EmptyReferenceTableError } from './errors';
import type { Rgb, ShadeEntry, ShadeMatch, ShadeTable } from './types';

/**
 * Find the shade in `table` nearest to `sample` in Lab space.
 *
 * Reference entries are converted on every call. Comparison is strict, so when
 * two entries are equally close the one listed first in the table wins.
 */
export function findClosestShade(sample: Rgb, table: ShadeTable): ShadeMatch {
  if (table.shades.length === 0) {
    throw new EmptyReferenceTableError(table.name);
  }

  const sampleLab = rgbToLab(sample);
  let closest: ShadeEntry = table.shades[0];
  let minDistance = Infinity;

  for (const entry of table.shades) {
    const distance = deltaE76(sampleLab, rgbToLab(entry.rgb));

    if (distance < minDistance) {
      minDistance = distance;
      closest = entry;
    }
  }

  return {
    systemId: table.id,
    systemName: table.name,
    shade: closest.label,
    deltaE: Math.round(minDistance * 100) / 100
  };
}

/**
 * Run one independent search per table, in the order given
 */
export function matchShadeSystems(sample: Rgb, tables: ShadeTable[]): ShadeMatch[] {
  return tables.map(table => findClosestShade(sample, table));
}

export class ShadeMatcher {
  private tables: ShadeTable[];

  constructor(tables: ShadeTable[]) {
    this.tables = tables;
  }

  /**
   * Match a sampled colour against every configured shade system
   */
  public match(sample: Rgb): ShadeMatch[] {
    console.log(`🎯 Matching ${formatRgb(sample)} against ${this.tables.length} shade system(s)`);
    return matchShadeSystems(sample, this.tables);
  }

  /**
   * Print detailed matching results
   */
  public printMatchingResults(sample: Rgb, matches: ShadeMatch[]): void {
    console.log('\n🦷 SHADE MATCHING RESULTS');
    console.log('=========================');
    console.log(`   Sampled colour: ${formatRgb(sample)} ${rgbToHex(sample)}`);

    for (const match of matches) {
      console.log(`   ✅ ${match.systemName}: ${match.shade} (ΔE ${match.deltaE.toFixed(2)})`);
    }
    console.log('');
  }
}
