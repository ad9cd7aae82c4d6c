import { errorMessage } from "../core/errors";
import type { Logger } from "../logging";
import { decodePng, matchTemplates } from "../vision/templateMatcher";
import type { GrayImage } from "../vision/templateMatcher";
import type { TemplateLibrary } from "../vision/templateLibrary";
import { DEFAULT_INTENTS } from "./intents";
import type { IntentCatalog, IntentName } from "./intents";
import type { ActionTarget, PageSnapshot } from "./session";

export type LocateResult =
  | { kind: "found"; target: ActionTarget; strategy: "structural" | "image" }
  | { kind: "not-found"; reason: string };

export interface ElementLocatorOptions {
  templates: TemplateLibrary;
  intents?: IntentCatalog;
  threshold?: number;
  scales?: number[];
  logger?: Logger;
}

export class ElementLocator {
  private templates: TemplateLibrary;
  private intents: IntentCatalog;
  private threshold: number;
  private scales: number[];
  private logger?: Logger;

  constructor(options: ElementLocatorOptions) {
    this.templates = options.templates;
    this.intents = options.intents ?? DEFAULT_INTENTS;
    this.threshold = options.threshold ?? 0.8;
    this.scales = options.scales ?? [0.9, 1, 1.1];
    this.logger = options.logger;
  }

  async locate(snapshot: PageSnapshot, intent: IntentName): Promise<LocateResult> {
    const descriptor = this.intents[intent];
    let structuralReason = "no structural match";

    for (const selector of descriptor.selectors) {
      const elements = await snapshot.queryElements(selector);
      if (elements.length === 0) {
        continue;
      }
      if (elements.length === 1 || descriptor.match === "first") {
        return { kind: "found", target: { kind: "element", element: elements[0] }, strategy: "structural" };
      }
      structuralReason = `${elements.length} ambiguous matches for ${selector}`;
      break;
    }

    return this.imageFallback(snapshot, intent, structuralReason);
  }

  private async imageFallback(snapshot: PageSnapshot, intent: IntentName, structuralReason: string): Promise<LocateResult> {
    const templates = this.templates.get(intent) ?? [];
    if (templates.length === 0) {
      return { kind: "not-found", reason: `${structuralReason}; no templates for ${intent}` };
    }

    const capture = await snapshot.screenshot();
    let screenshot: GrayImage;
    try {
      screenshot = decodePng(capture);
    } catch (error) {
      return { kind: "not-found", reason: `${structuralReason}; screenshot could not be decoded: ${errorMessage(error)}` };
    }
    const match = matchTemplates(screenshot, templates, { threshold: this.threshold, scales: this.scales });
    if (!match) {
      return { kind: "not-found", reason: `${structuralReason}; no template above ${this.threshold}` };
    }

    this.logger?.info(
      `Image match for ${intent}: ${match.template} at (${match.x}, ${match.y}) confidence=${match.confidence.toFixed(3)}`
    );
    return {
      kind: "found",
      target: { kind: "point", x: match.x, y: match.y, confidence: match.confidence, template: match.template },
      strategy: "image",
    };
  }
}
