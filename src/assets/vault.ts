import fs from "fs";
import path from "path";
import crypto from "crypto";
import type { AppConfig } from "../config";
import { ConfigError } from "../core/errors";
import type { ResumeAsset } from "../types/context";

export const RESUME_EXTENSIONS = [".pdf", ".docx", ".txt", ".md"];

export interface VaultResult {
  resume: ResumeAsset;
  config: AppConfig;
  reused: boolean;
}

// Copies the resume into assetsDir under a content-addressed name and points the config at the copy.
export async function addResumeToVault(config: AppConfig, sourcePath: string): Promise<VaultResult> {
  if (!fs.existsSync(sourcePath) || !fs.statSync(sourcePath).isFile()) {
    throw new ConfigError(`Resume path must be an existing file: ${sourcePath}`);
  }

  const ext = path.extname(sourcePath).toLowerCase();
  if (!RESUME_EXTENSIONS.includes(ext)) {
    throw new ConfigError(`Resume must be one of ${RESUME_EXTENSIONS.join(", ")} (got "${ext || "no extension"}")`);
  }

  fs.mkdirSync(config.app.assetsDir, { recursive: true });
  const sha256 = await computeSha256(sourcePath);
  const destPath = path.join(config.app.assetsDir, vaultFilename(sourcePath, ext, sha256));
  const reused = fs.existsSync(destPath);
  if (!reused) {
    fs.copyFileSync(sourcePath, destPath);
  }

  const resume: ResumeAsset = { path: destPath, sha256 };
  return { resume, config: { ...config, resume }, reused };
}

function vaultFilename(sourcePath: string, ext: string, sha256: string): string {
  const label = path.basename(sourcePath, path.extname(sourcePath)).trim().replace(/[^a-zA-Z0-9_-]+/g, "-");
  return `resume_${label || "resume"}_${sha256.slice(0, 8)}${ext}`;
}

export function computeSha256(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (data: string | Buffer) => hash.update(data));
    stream.on("error", (error: Error) => reject(error));
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}
