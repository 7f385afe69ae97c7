export type BrowserKind = 'chromium' | 'firefox' | 'webkit';

export interface BrowserSettings {
  headless?: boolean;
  save_screenshots?: boolean;
  sleep_after_load?: number;   // seconds
  wait_seconds?: number;
  page_load_timeout?: number;  // seconds
  browser?: BrowserKind;
}

export interface DebugSettings {
  save_html?: boolean;
}

export interface ApiEndpointConfig {
  url?: string;
  method?: string;
  headers?: Record<string, string>;
  params?: Record<string, unknown>;
  body?: unknown;
}

export interface RuntimeConfig {
  success_threshold: number;
  politeness_delay_seconds: number;
  selenium: BrowserSettings;
  debug: DebugSettings;
  api_endpoint?: ApiEndpointConfig;
  wait_css_selectors?: string[];
  field_weights?: Record<string, number>;
  output_dir: string;
}

/** Runtime config as read from a file, before it is merged over the defaults. */
export type RuntimeConfigFile = Partial<RuntimeConfig>;

export type OutputFormat = 'xlsx' | 'csv' | 'json';
export type OutputTarget = { directory: string; base: string; timestamp?: Date };
