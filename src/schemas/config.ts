import path from 'path';
import { z } from 'zod';

const range = (min: number, max: number) =>
  z.tuple([z.number().nonnegative(), z.number().nonnegative()])
    .refine(([a, b]) => a <= b, { message: 'range min must not exceed max' })
    .default([min, max]);

export const DEFAULT_USER_AGENTS: [string, ...string[]] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.5993.90 Safari/537.36',
];

export const DEFAULT_CHALLENGE_MARKERS = [
  'мы проверяем, что вы не робот',
  'checking your browser',
  'you will be redirected',
  'cloudflare',
  'подождите несколько секунд',
];

export const ScraperConfigSchema = z.object({
  catalogUrl: z.string().url().default('https://zoon.ru/tomsk/restaurants/'),
  totalPages: z.number().int().positive().default(34),
  headless: z.boolean().default(false),
  outDir: z.string().min(1).default(() => path.join(process.cwd(), 'zoon_out')),
  csvBaseName: z.string().min(1).default('zoon_tomsk_restaurants'),
  logBaseName: z.string().min(1).default('zoon_loader_log'),

  userAgents: z.array(z.string().min(1)).nonempty().default(DEFAULT_USER_AGENTS),
  acceptLanguage: z.string().default('ru-RU,ru;q=0.9,en-US;q=0.8'),
  windowWidth: range(1280, 1680),
  windowHeight: range(820, 1050),

  // milliseconds
  navigationTimeout: z.number().int().positive().default(60_000),
  containerTimeout: z.number().int().positive().default(25_000),
  initialDelay: range(1500, 3000),
  pageDelay: range(2800, 5200),
  scrollDelay: range(600, 1200),
  scrollResetDelay: range(500, 1100),
  challengePollDelay: range(2200, 4200),
  manualRetryDelay: range(3500, 5500),

  scrollSteps: range(4, 7),
  challengePollAttempts: z.number().int().nonnegative().default(10),
  manualRetryAttempts: z.number().int().nonnegative().default(6),
  challengeMarkers: z.array(z.string().min(1)).default(DEFAULT_CHALLENGE_MARKERS),
});

export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;
export type ScraperConfig = Readonly<z.infer<typeof ScraperConfigSchema>>;
export type DelayRange = readonly [number, number];

export function resolveConfig(overrides: ScraperConfigInput = {}): ScraperConfig {
  return Object.freeze(ScraperConfigSchema.parse(overrides));
}

export function pageUrl(config: Pick<ScraperConfig, 'catalogUrl'>, page: number): string {
  return page === 1 ? config.catalogUrl : `${config.catalogUrl.replace(/\/+$/, '')}/page-${page}/`;
}

const pad = (page: number) => String(page).padStart(2, '0');

export const csvPath = (c: ScraperConfig) => path.join(c.outDir, `${c.csvBaseName}.csv`);
export const logPath = (c: ScraperConfig) => path.join(c.outDir, `${c.logBaseName}.txt`);
export const partialCsvPath = (c: ScraperConfig, page: number) => path.join(c.outDir, `${c.csvBaseName}_page_${pad(page)}.csv`);
export const partialLogPath = (c: ScraperConfig, page: number) => path.join(c.outDir, `${c.logBaseName}_page_${pad(page)}.txt`);
