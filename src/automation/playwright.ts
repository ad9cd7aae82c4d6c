import { chromium } from "playwright";
import type { Browser, BrowserContext, Page } from "playwright";
import { BrowserCrashError, toHireloopError } from "../core/errors";
import type { ActionTarget, BrowserSession, ElementRef, SessionProvider } from "./session";

export interface PlaywrightOptions {
  headless: boolean;
  slowMoMs: number;
  navigationTimeoutMs: number;
  settleMs?: number;
}

const REF_ATTRIBUTE = "data-hireloop-ref";

function launchOptions(options: PlaywrightOptions) {
  const executablePath = process.env.HIRELOOP_CHROME_PATH;
  return {
    headless: options.headless,
    slowMo: options.slowMoMs,
    executablePath: executablePath && executablePath.length > 0 ? executablePath : undefined,
    args: ["--disable-crashpad", "--disable-crash-reporter", "--no-crashpad"],
  };
}

// One browser process; each session gets its own context so cookies and storage never leak between postings.
export class PlaywrightSessionProvider implements SessionProvider {
  private options: PlaywrightOptions;
  // Shared by concurrent callers so parallel workers reuse a single launch.
  private launching?: Promise<Browser>;

  constructor(options: PlaywrightOptions) {
    this.options = options;
  }

  async newSession(): Promise<BrowserSession> {
    const browser = await this.launch();
    const context = await browser.newContext({ viewport: { width: 1280, height: 900 } });
    const page = await context.newPage();
    page.setDefaultTimeout(this.options.navigationTimeoutMs);
    return new PlaywrightBrowserSession(context, page, this.options);
  }

  async close(): Promise<void> {
    const launching = this.launching;
    this.launching = undefined;
    if (!launching) {
      return;
    }
    let browser: Browser;
    try {
      browser = await launching;
    } catch {
      // The launch failure was already raised to the newSession caller.
      return;
    }
    await browser.close();
  }

  private launch(): Promise<Browser> {
    if (!this.launching) {
      const launching: Promise<Browser> = chromium.launch(launchOptions(this.options)).then(
        (browser) => {
          browser.on("disconnected", () => this.forget(launching));
          return browser;
        },
        (error: unknown) => {
          this.forget(launching);
          throw error;
        }
      );
      this.launching = launching;
    }
    return this.launching;
  }

  private forget(launching: Promise<Browser>): void {
    if (this.launching === launching) {
      this.launching = undefined;
    }
  }
}

class PlaywrightBrowserSession implements BrowserSession {
  private context: BrowserContext;
  private page: Page;
  private options: PlaywrightOptions;
  private nextRef = 0;
  private crashed?: string;

  constructor(context: BrowserContext, page: Page, options: PlaywrightOptions) {
    this.context = context;
    this.page = page;
    this.options = options;
    page.on("crash", () => {
      this.crashed = "page crashed";
    });
    page.on("close", () => {
      this.crashed = this.crashed ?? "page closed";
    });
  }

  navigate(url: string): Promise<void> {
    return this.guard(async () => {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
    });
  }

  queryElements(selector: string): Promise<ElementRef[]> {
    return this.guard(async () => {
      const locator = this.page.locator(selector);
      const count = await locator.count();
      const refs: ElementRef[] = [];
      for (let index = 0; index < count; index += 1) {
        this.nextRef += 1;
        const ref = String(this.nextRef);
        const text = await locator.nth(index).evaluate(
          (element, args) => {
            element.setAttribute(args.attribute, args.ref);
            return (element.textContent ?? "").trim().slice(0, 120);
          },
          { attribute: REF_ATTRIBUTE, ref }
        );
        refs.push({ ref, selector: `[${REF_ATTRIBUTE}="${ref}"]`, text: text.length > 0 ? text : undefined });
      }
      return refs;
    });
  }

  screenshot(): Promise<Buffer> {
    return this.guard(() => this.page.screenshot({ fullPage: false, type: "png" }));
  }

  click(target: ActionTarget): Promise<void> {
    return this.guard(async () => {
      if (target.kind === "element") {
        await this.page.click(target.element.selector);
      } else {
        await this.page.mouse.click(target.x, target.y);
      }
      await this.settle();
    });
  }

  typeText(target: ActionTarget, value: string): Promise<void> {
    return this.guard(async () => {
      if (target.kind === "element") {
        await this.page.fill(target.element.selector, value);
        return;
      }
      await this.page.mouse.click(target.x, target.y);
      await this.page.keyboard.press("ControlOrMeta+A");
      await this.page.keyboard.type(value);
    });
  }

  uploadFile(target: ActionTarget, filePath: string): Promise<void> {
    return this.guard(async () => {
      if (target.kind === "element") {
        await this.page.setInputFiles(target.element.selector, filePath);
        return;
      }
      const [chooser] = await Promise.all([
        this.page.waitForEvent("filechooser"),
        this.page.mouse.click(target.x, target.y),
      ]);
      await chooser.setFiles(filePath);
    });
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  private async settle(): Promise<void> {
    await this.page.waitForLoadState("domcontentloaded");
    await this.page.waitForTimeout(this.options.settleMs ?? 1000);
  }

  private async guard<T>(action: () => Promise<T>): Promise<T> {
    if (this.crashed) {
      throw new BrowserCrashError(`Browser session unusable: ${this.crashed}`);
    }
    try {
      return await action();
    } catch (error) {
      if (this.crashed) {
        throw new BrowserCrashError(`Browser session unusable: ${this.crashed}`, { cause: error });
      }
      throw toHireloopError(error);
    }
  }
}
