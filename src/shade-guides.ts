import shadeGuideData from './data/shade-guides.json';
import { UnknownShadeSystemError } from './errors';
import { describeIssues, shadeGuideSetSchema } from './schemas';
import type { ShadeGuideSet, ShadeSystemId, ShadeTable } from './types';

let cachedGuides: ShadeGuideSet | null = null;

/**
 * Parse a shade guide definition, failing on anything that does not match the schema
 */
export function parseShadeGuides(raw: unknown): ShadeGuideSet {
  const result = shadeGuideSetSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid shade guide definition: ${describeIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Load the bundled reference tables (parsed once per process)
 */
export function loadShadeGuides(): ShadeGuideSet {
  if (!cachedGuides) {
    cachedGuides = parseShadeGuides(shadeGuideData);
  }
  return cachedGuides;
}

export function listShadeSystems(guides: ShadeGuideSet = loadShadeGuides()): ShadeTable[] {
  return guides.systems;
}

export function getShadeTable(id: ShadeSystemId, guides: ShadeGuideSet = loadShadeGuides()): ShadeTable {
  const table = guides.systems.find(system => system.id === id);
  if (!table) {
    throw new UnknownShadeSystemError(id);
  }
  return table;
}

/**
 * Accept either a system id ("vita-3d-master") or its display name ("Vita 3D Master"), any case
 */
export function resolveShadeSystem(nameOrId: string, guides: ShadeGuideSet = loadShadeGuides()): ShadeTable {
  const wanted = nameOrId.trim().toLowerCase();
  const table = guides.systems.find(
    system => system.id === wanted || system.name.toLowerCase() === wanted
  );
  if (!table) {
    throw new UnknownShadeSystemError(nameOrId);
  }
  return table;
}
