import { ScraperConfigInput } from '../schemas/config';

export type Args = Record<string, string | boolean>;

export function parseArgs(argv: string[]): Args {
  const out: Args = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = argv[i + 1];
      if (next && !next.startsWith('--')) { out[key] = next; i++; } else { out[key] = true; }
    }
  }
  return out;
}

const OFF = ['0', 'false', 'no', 'n', 'off'];

// a bare flag means on
const asBool = (v: string | boolean) => (typeof v === 'boolean' ? v : !OFF.includes(v.toLowerCase().trim()));

export function overridesFromArgs(args: Args): ScraperConfigInput {
  const str = (k: string) => {
    const v = args[k];
    return typeof v === 'string' ? v : undefined;
  };
  const overrides: ScraperConfigInput = {};
  const url = str('url');
  const pages = str('pages');
  const out = str('out');
  if (url) overrides.catalogUrl = url;
  if (pages) overrides.totalPages = Number(pages);
  if (out) overrides.outDir = out;
  if (args.headless !== undefined) overrides.headless = asBool(args.headless);
  return overrides;
}
