import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page, Request, Response, Route } from 'playwright';
import type {
  BrowserLaunchOptions,
  ContextOptions,
  RenderBrowser,
  RenderContext,
  RenderEngine,
  RenderPage,
  RenderRequest,
  RenderResponse,
  RenderRoute
} from '../types/browser.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('local-browser');

export const DEFAULT_LAUNCH_ARGS = [
  '--disable-images',
  '--disable-plugins',
  '--blink-settings=imagesEnabled=false',
  '--ignore-certificate-errors'
];

function toRenderRequest(request: Request, page: Page): RenderRequest {
  let isMainDocument = false;
  if (request.resourceType() === 'document' && request.isNavigationRequest()) {
    try {
      isMainDocument = request.frame() === page.mainFrame();
    } catch {
      // Service worker requests have no frame
      isMainDocument = false;
    }
  }
  return {
    url: request.url(),
    resourceType: request.resourceType(),
    isMainDocument
  };
}

function toRenderRoute(route: Route, page: Page): RenderRoute {
  return {
    request: toRenderRequest(route.request(), page),
    abort: () => route.abort(),
    continue: () => route.continue()
  };
}

function toRenderResponse(response: Response): RenderResponse {
  return {
    url: response.url(),
    status: response.status(),
    headers: response.headers(),
    text: () => response.text()
  };
}

function wrapPage(page: Page): RenderPage {
  return {
    goto: async (url, options) => {
      await page.goto(url, { timeout: options.timeout });
    },
    content: () => page.content(),
    waitForSelector: async (selector, options) => {
      await page.waitForSelector(selector, { timeout: options.timeout });
    },
    url: () => page.url(),
    onRequest: (handler) => page.route('**/*', route => handler(toRenderRoute(route, page))),
    onResponse: (listener) => {
      page.on('response', response => listener(toRenderResponse(response)));
    },
    close: () => page.close()
  };
}

function wrapContext(context: BrowserContext): RenderContext {
  context.on('close', () => {
    log.debug('Browser context closed');
  });

  return {
    newPage: async () => wrapPage(await context.newPage()),
    close: () => context.close()
  };
}

function wrapBrowser(browser: Browser): RenderBrowser {
  browser.on('disconnected', () => {
    log.debug('Local browser disconnected');
  });

  return {
    newContext: async (options: ContextOptions) => wrapContext(await browser.newContext(options)),
    close: () => browser.close()
  };
}

/**
 * Local Chromium launched once per scrape session.
 * The proxy is applied per context, see ScrapeSession.
 */
export class LocalBrowserEngine implements RenderEngine {
  private readonly headless: boolean;
  private readonly args: string[];

  constructor(options: BrowserLaunchOptions = {}) {
    this.headless = options.headless ?? true;
    this.args = options.args ?? DEFAULT_LAUNCH_ARGS;
  }

  async launch(): Promise<RenderBrowser> {
    const browser = await chromium.launch({
      headless: this.headless,
      args: this.args
    });
    return wrapBrowser(browser);
  }
}
