import type { JobSource, SourceConfig } from "../types/jobs";
import { createGreenhouseSource } from "./greenhouseFetcher";
import { createLeverSource } from "./leverFetcher";
import { createRemotiveSource } from "./remotiveFetcher";

type SourceFactory<T extends SourceConfig["type"]> = (config: Extract<SourceConfig, { type: T }>) => JobSource;

export interface SourceRegistry {
  remotive: SourceFactory<"remotive">;
  greenhouse: SourceFactory<"greenhouse">;
  lever: SourceFactory<"lever">;
}

export function createSourceRegistry(): SourceRegistry {
  return {
    remotive: (config) => createRemotiveSource(config),
    greenhouse: (config) => createGreenhouseSource(config.slug, config.company),
    lever: (config) => createLeverSource(config.slug, config.company),
  };
}

export function buildSources(configs: SourceConfig[], registry: SourceRegistry = createSourceRegistry()): JobSource[] {
  return configs.map((config) => {
    switch (config.type) {
      case "remotive":
        return registry.remotive(config);
      case "greenhouse":
        return registry.greenhouse(config);
      case "lever":
        return registry.lever(config);
    }
  });
}
