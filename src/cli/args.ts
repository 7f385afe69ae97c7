import { existsSync, readFileSync } from 'fs';

export interface CliOptions {
  config?: string;
  fields?: string;
  url?: string;
  urlFile?: string;
  out: string;
  help: boolean;
}

export const USAGE = `Usage: field-scraper [options]

  -c, --config <path>    runtime config (YAML or JSON)
  -f, --fields <path>    field config (YAML or JSON); defaults to the sample assessment fields
  -u, --url <url>        single URL to scrape
  -U, --url-file <path>  text file with one URL per line
  -o, --out <name>       output filename base, without extension (default: assessment_reports)
  -h, --help             show this help`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { out: 'assessment_reports', help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '-c' || arg === '--config') && next) {
      options.config = next;
      i += 1;
    } else if ((arg === '-f' || arg === '--fields') && next) {
      options.fields = next;
      i += 1;
    } else if ((arg === '-u' || arg === '--url') && next) {
      options.url = next;
      i += 1;
    } else if ((arg === '-U' || arg === '--url-file') && next) {
      options.urlFile = next;
      i += 1;
    } else if ((arg === '-o' || arg === '--out') && next) {
      options.out = next;
      i += 1;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    }
  }
  return options;
}

/** `--url` first, then the non-blank lines of `--url-file` when that file exists. */
export function collectUrls(options: Pick<CliOptions, 'url' | 'urlFile'>): string[] {
  const urls: string[] = [];
  if (options.url?.trim()) urls.push(options.url.trim());
  if (options.urlFile && existsSync(options.urlFile)) {
    const lines = readFileSync(options.urlFile, 'utf-8').split(/\r?\n/);
    urls.push(...lines.map(line => line.trim()).filter(Boolean));
  }
  return urls;
}
