import { ShadeMatcherError, UsageError } from './errors';
import type { PatientHistoryStore } from './history-store';
import { ReportRenderer } from './report-renderer';
import type { ShadeAnalysisService } from './shade-analysis';
import { ShadeGuideValidator } from './shade-guide-validator';
import { loadShadeGuides, resolveShadeSystem } from './shade-guides';
import { formatRgb } from './color-space';
import type { SampleRegion, SamplingMode, ShadeGuideSet } from './types';

export const USAGE = [
  'Usage:',
  '  shade-matcher analyze <image> --name <name> --age <age> --sex <Male|Female|Other>',
  '                [--systems <system,...>] [--mode average|center|point|rect]',
  '                [--point x,y] [--rect x,y,width,height]',
  '                [--override-system <system>] [--override-shade <label>]',
  '  shade-matcher history [name]',
  '  shade-matcher guides',
  '',
  'Systems: "Vita", "Vita 3D Master", "Ivoclar Chromascop" (or vita-classical, vita-3d-master, ivoclar-chromascop)'
].join('\n');

export type CliCommand =
  | { command: 'analyze'; submission: Record<string, unknown> }
  | { command: 'history'; query?: string }
  | { command: 'guides' }
  | { command: 'help' };

export interface CliDependencies {
  service: ShadeAnalysisService;
  store: PatientHistoryStore;
  defaultSystems: string[];
  defaultSamplingMode: SamplingMode;
  guides?: ShadeGuideSet;
}

interface ParsedTokens {
  positionals: string[];
  flags: Map<string, string>;
}

const VALUE_FLAGS = new Set([
  'name',
  'age',
  'sex',
  'systems',
  'mode',
  'point',
  'rect',
  'override-system',
  'override-shade'
]);

function tokenize(args: string[]): ParsedTokens {
  const positionals: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const equalsAt = arg.indexOf('=');
    const key = equalsAt === -1 ? arg.slice(2) : arg.slice(2, equalsAt);
    if (key === 'help') {
      flags.set(key, 'true');
      continue;
    }
    if (!VALUE_FLAGS.has(key)) {
      throw new UsageError(`Unknown option --${key}`);
    }

    if (equalsAt !== -1) {
      flags.set(key, arg.slice(equalsAt + 1));
    } else {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`Option --${key} needs a value`);
      }
      flags.set(key, value);
      i++;
    }
  }

  return { positionals, flags };
}

function parseIntegers(value: string, count: number, flag: string): number[] {
  const parts = value.split(',').map(part => part.trim());
  const numbers = parts.map(Number);
  if (parts.length !== count || parts.some(part => part === '') || !numbers.every(Number.isInteger)) {
    throw new UsageError(`--${flag} expects ${count} comma-separated whole numbers, got "${value}"`);
  }
  return numbers;
}

function parseRegion(flags: Map<string, string>): SampleRegion | undefined {
  const point = flags.get('point');
  const rect = flags.get('rect');
  if (point !== undefined && rect !== undefined) {
    throw new UsageError('Use either --point or --rect, not both');
  }
  if (point !== undefined) {
    const [x, y] = parseIntegers(point, 2, 'point');
    return { kind: 'point', x, y };
  }
  if (rect !== undefined) {
    const [x, y, width, height] = parseIntegers(rect, 4, 'rect');
    return { kind: 'rect', x, y, width, height };
  }
  return undefined;
}

/**
 * Turn argv (without node and script) into a command; analyze input is left for the service to validate
 */
export function parseArgs(
  args: string[],
  defaults: Pick<CliDependencies, 'defaultSystems' | 'defaultSamplingMode'>,
  guides: ShadeGuideSet = loadShadeGuides()
): CliCommand {
  const { positionals, flags } = tokenize(args);
  const [command, ...rest] = positionals;

  if (command === undefined || command === 'help' || flags.has('help')) {
    return { command: 'help' };
  }

  switch (command) {
    case 'guides':
      return { command: 'guides' };
    case 'history':
      return { command: 'history', query: rest.length > 0 ? rest.join(' ') : undefined };
    case 'analyze':
      break;
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }

  if (rest.length !== 1) {
    throw new UsageError('analyze takes exactly one image path');
  }

  const region = parseRegion(flags);
  const mode = flags.get('mode') ?? region?.kind ?? defaults.defaultSamplingMode;
  const systemNames = flags.get('systems')?.split(',') ?? defaults.defaultSystems;
  const systems = systemNames.map(name => resolveShadeSystem(name, guides).id);

  const ageFlag = flags.get('age');
  const overrideShade = flags.get('override-shade');
  const overrideSystem = flags.get('override-system');
  if (overrideSystem !== undefined && overrideShade === undefined) {
    throw new UsageError('--override-system needs --override-shade');
  }

  const submission: Record<string, unknown> = {
    imagePath: rest[0],
    patient: {
      name: flags.get('name') ?? '',
      age: ageFlag === undefined ? undefined : Number(ageFlag),
      sex: flags.get('sex')
    },
    systems,
    samplingMode: mode,
    region
  };

  if (overrideShade !== undefined) {
    submission.manualOverride = {
      shade: overrideShade,
      systemId: overrideSystem === undefined ? undefined : resolveShadeSystem(overrideSystem, guides).id
    };
  }

  return { command: 'analyze', submission };
}

async function printHistory(store: PatientHistoryStore, query?: string): Promise<void> {
  const records = query === undefined ? await store.list() : await store.queryByName(query);

  if (records.length === 0) {
    console.log(query === undefined ? '📁 No past reports yet' : `📁 No past reports found for "${query}"`);
    return;
  }

  console.log(`📁 ${records.length} past report(s)`);
  for (const record of records) {
    console.log(`\n### ${record.patient.name} (${record.createdAt})`);
    ReportRenderer.renderSummary(record).forEach(line => console.log(line));
  }
}

function printGuides(guides: ShadeGuideSet): void {
  console.log(`🦷 Shade guides (version ${guides.version})`);
  for (const table of guides.systems) {
    console.log(`\n${table.name} [${table.id}]`);
    for (const entry of table.shades) {
      console.log(`   ${entry.label.padEnd(6)} ${formatRgb(entry.rgb)}`);
    }
  }
  console.log('');
  console.log(ShadeGuideValidator.validate(guides).summary);
}

/**
 * Run one command and return the process exit code
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  const guides = deps.guides ?? loadShadeGuides();

  try {
    const parsed = parseArgs(args, deps, guides);

    switch (parsed.command) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'guides':
        printGuides(guides);
        return 0;
      case 'history':
        await printHistory(deps.store, parsed.query);
        return 0;
      case 'analyze': {
        const { summary } = await deps.service.analyze(parsed.submission);
        console.log('');
        summary.forEach(line => console.log(line));
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof ShadeMatcherError) {
      console.error(`❌ ${error.message}`);
      if (error instanceof UsageError) {
        console.log(`\n${USAGE}`);
      }
      return 1;
    }
    throw error;
  }
}
