import { DEFAULT_INTENTS } from "../automation/intents";
import type { IntentName } from "../automation/intents";
import type { ActionTarget, BrowserSession, ElementRef, SessionProvider } from "../automation/session";
import { createPosting } from "../discovery/fingerprint";
import type { JobPosting, JobPostingInput, JobSource, TimeWindow } from "../types/jobs";

export interface FakeClock {
  now: () => Date;
  advance(ms: number): void;
}

export function createClock(start = "2024-05-01T12:00:00.000Z"): FakeClock {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

export function makePosting(overrides: Partial<JobPostingInput> = {}): JobPosting {
  return createPosting({
    source: "remotive",
    sourceId: "1",
    title: "Backend Engineer",
    company: "Acme",
    location: "Remote",
    description: "TypeScript and PostgreSQL services",
    postedAt: "2024-05-01T08:00:00.000Z",
    url: "https://jobs.example.com/acme/1",
    ...overrides,
  });
}

export function fakeSource(name: string, list: (window: TimeWindow) => Promise<JobPosting[]>): JobSource {
  return { name, list };
}

export type FakeActionKind = "navigate" | "query" | "screenshot" | "click" | "type" | "upload";

export interface FakeAction {
  kind: FakeActionKind;
  intent?: IntentName;
  value?: string;
}

export interface FakeSessionOptions {
  visible?: IntentName[];
  // Intents whose structural lookup returns two elements.
  ambiguous?: IntentName[];
  // Number of locate attempts that see nothing before the intent appears.
  hiddenFor?: Partial<Record<IntentName, number>>;
  screenshot?: Buffer;
  beforeAction?: (action: FakeAction) => void;
}

const FIRST_SELECTOR = new Map<string, IntentName>(
  Object.values(DEFAULT_INTENTS).map((descriptor) => [descriptor.selectors[0], descriptor.name])
);

export function fakeSelector(intent: IntentName): string {
  return `[data-fake="${intent}"]`;
}

// Answers only each intent's first selector; the remaining selectors always come back empty.
export class FakeBrowserSession implements BrowserSession {
  readonly actions: string[] = [];
  screenshots = 0;
  closed = false;
  private visible: Set<IntentName>;
  private ambiguous: Set<IntentName>;
  private hiddenFor = new Map<IntentName, number>();
  private refIntents = new Map<string, IntentName>();
  private options: FakeSessionOptions;

  constructor(options: FakeSessionOptions = {}) {
    this.options = options;
    this.visible = new Set(options.visible ?? []);
    this.ambiguous = new Set(options.ambiguous ?? []);
    for (const { name } of Object.values(DEFAULT_INTENTS)) {
      const count = options.hiddenFor?.[name];
      if (count) {
        this.hiddenFor.set(name, count);
      }
    }
  }

  setVisible(intent: IntentName, visible: boolean): void {
    if (visible) {
      this.visible.add(intent);
    } else {
      this.visible.delete(intent);
    }
  }

  async navigate(url: string): Promise<void> {
    this.options.beforeAction?.({ kind: "navigate", value: url });
    this.actions.push(`navigate ${url}`);
  }

  async queryElements(selector: string): Promise<ElementRef[]> {
    const intent = FIRST_SELECTOR.get(selector);
    if (!intent) {
      return [];
    }
    this.options.beforeAction?.({ kind: "query", intent });

    const hidden = this.hiddenFor.get(intent) ?? 0;
    if (hidden > 0) {
      this.hiddenFor.set(intent, hidden - 1);
      return [];
    }
    if (this.ambiguous.has(intent)) {
      return [this.element(intent, `${intent}-1`), this.element(intent, `${intent}-2`)];
    }
    if (!this.visible.has(intent)) {
      return [];
    }
    return [this.element(intent, intent)];
  }

  async screenshot(): Promise<Buffer> {
    this.options.beforeAction?.({ kind: "screenshot" });
    this.screenshots += 1;
    if (!this.options.screenshot) {
      throw new Error("FakeBrowserSession has no screenshot configured");
    }
    return this.options.screenshot;
  }

  async click(target: ActionTarget): Promise<void> {
    this.act("click", target);
  }

  async typeText(target: ActionTarget, value: string): Promise<void> {
    this.act("type", target, value);
  }

  async uploadFile(target: ActionTarget, filePath: string): Promise<void> {
    this.act("upload", target, filePath);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private element(intent: IntentName, ref: string): ElementRef {
    this.refIntents.set(ref, intent);
    return { ref, selector: fakeSelector(intent), text: intent };
  }

  private act(kind: FakeActionKind, target: ActionTarget, value?: string): void {
    const label = target.kind === "element" ? target.element.selector : `(${target.x},${target.y})`;
    const intent = target.kind === "element" ? this.refIntents.get(target.element.ref) : undefined;
    this.options.beforeAction?.({ kind, intent, value });
    this.actions.push(value === undefined ? `${kind} ${label}` : `${kind} ${label} ${value}`);
  }
}

export class FakeSessionProvider implements SessionProvider {
  readonly created: FakeBrowserSession[] = [];
  closed = false;
  private factory: () => FakeBrowserSession;

  constructor(factory: () => FakeBrowserSession) {
    this.factory = factory;
  }

  async newSession(): Promise<BrowserSession> {
    const session = this.factory();
    this.created.push(session);
    return session;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
