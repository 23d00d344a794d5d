/**
 * Rendering engine capability. Sessions only see these interfaces;
 * the Playwright provider adapts real browser objects to them.
 */

export interface DeviceProfile {
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
  javaScriptEnabled: boolean;
  ignoreHTTPSErrors: boolean;
}

export interface ContextOptions extends DeviceProfile {
  proxy?: {
    server: string;
    username?: string;
    password?: string;
  };
}

export interface RenderRequest {
  url: string;
  resourceType: string;
  /** True for the top-level document navigation of the page's main frame */
  isMainDocument: boolean;
}

export interface RenderRoute {
  request: RenderRequest;
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export interface RenderResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  text(): Promise<string>;
}

export interface NavigationOptions {
  timeout: number;
}

export interface RenderPage {
  goto(url: string, options: NavigationOptions): Promise<void>;
  content(): Promise<string>;
  waitForSelector(selector: string, options: NavigationOptions): Promise<void>;
  url(): string;
  onRequest(handler: (route: RenderRoute) => Promise<void>): Promise<void>;
  onResponse(listener: (response: RenderResponse) => void): void;
  close(): Promise<void>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newContext(options: ContextOptions): Promise<RenderContext>;
  close(): Promise<void>;
}

export interface RenderEngine {
  launch(): Promise<RenderBrowser>;
}

export interface BrowserLaunchOptions {
  headless?: boolean;
  args?: string[];
}
