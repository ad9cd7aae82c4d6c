import fs from "fs";
import path from "path";
import mammoth from "mammoth";
import { computeSha256 } from "../assets/vault";
import { ExtractionError, errorMessage } from "../core/errors";

export interface ResumeExtractor {
  extractText(filePath: string): Promise<string>;
}

export interface ResumeExtractorOptions {
  // Extracted text is kept as <cacheDir>/<sha256>.txt and reused while the file is unchanged.
  cacheDir?: string;
}

export function createResumeExtractor(options: ResumeExtractorOptions = {}): ResumeExtractor {
  return {
    async extractText(filePath: string): Promise<string> {
      if (!fs.existsSync(filePath)) {
        throw new ExtractionError(`Resume not found: ${filePath}`);
      }
      if (!options.cacheDir) {
        return readResumeText(filePath);
      }

      const cachePath = path.join(options.cacheDir, `${await computeSha256(filePath)}.txt`);
      if (fs.existsSync(cachePath)) {
        return fs.readFileSync(cachePath, "utf8");
      }
      const text = await readResumeText(filePath);
      fs.mkdirSync(options.cacheDir, { recursive: true });
      fs.writeFileSync(cachePath, text, "utf8");
      return text;
    },
  };
}

async function readResumeText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();
  let text: string;
  try {
    if (ext === ".pdf") {
      const pdfParse = (await import("pdf-parse")).default;
      const data = await pdfParse(fs.readFileSync(filePath));
      text = data.text;
    } else if (ext === ".docx") {
      const result = await mammoth.extractRawText({ path: filePath });
      text = result.value;
    } else if (ext === ".txt" || ext === ".md") {
      text = fs.readFileSync(filePath, "utf8");
    } else {
      throw new ExtractionError(`Unsupported resume format "${ext || "(none)"}": ${filePath}`);
    }
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error;
    }
    throw new ExtractionError(`Could not read resume ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const normalized = text.replace(/\r\n/g, "\n").trim();
  if (normalized.length === 0) {
    throw new ExtractionError(`Resume has no extractable text: ${filePath}`);
  }
  return normalized;
}
