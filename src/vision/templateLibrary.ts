import fs from "fs";
import path from "path";
import type { Logger } from "../logging";
import { decodePng } from "./templateMatcher";
import type { NamedTemplate } from "./templateMatcher";

export type TemplateLibrary = ReadonlyMap<string, readonly NamedTemplate[]>;

export function emptyTemplateLibrary(): TemplateLibrary {
  return new Map();
}

export function createTemplateLibrary(entries: Record<string, NamedTemplate[]>): TemplateLibrary {
  return new Map(Object.entries(entries).map(([intent, templates]) => [intent, Object.freeze(templates.slice())]));
}

// Layout: <dir>/<intent>/<name>.png
export function loadTemplateLibrary(dir: string, logger?: Logger): TemplateLibrary {
  if (!fs.existsSync(dir)) {
    logger?.warn(`Template directory ${dir} not found; image fallback has no templates`);
    return emptyTemplateLibrary();
  }

  const entries: Record<string, NamedTemplate[]> = {};
  for (const intent of fs.readdirSync(dir).sort()) {
    const intentDir = path.join(dir, intent);
    if (!fs.statSync(intentDir).isDirectory()) {
      continue;
    }
    const templates: NamedTemplate[] = [];
    for (const file of fs.readdirSync(intentDir).sort()) {
      if (path.extname(file).toLowerCase() !== ".png") {
        continue;
      }
      templates.push({ name: `${intent}/${file}`, image: decodePng(fs.readFileSync(path.join(intentDir, file))) });
    }
    entries[intent] = templates;
    logger?.info(`Loaded ${templates.length} template(s) for ${intent}`);
  }
  return createTemplateLibrary(entries);
}
