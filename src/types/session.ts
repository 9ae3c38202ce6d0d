export interface Viewport {
  width: number;
  height: number;
}

export interface SessionSettings {
  viewport: Viewport;
  timeoutMs: number;
}

export interface LayoutMetrics {
  documentWidth: number;
  viewportWidth: number;
}

export interface ChromiumLaunchOptions {
  channel?: string;
  executablePath?: string;
  headless: boolean;
  args: string[];
}
