import { SourceError, errorMessage } from "../core/errors";

export async function fetchJson<T>(source: string, url: string): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { "User-Agent": "hireloop" } });
  } catch (error) {
    throw new SourceError(source, `${source} fetch failed: ${errorMessage(error)} (${url})`, { cause: error });
  }
  if (!response.ok) {
    throw new SourceError(source, `${source} fetch failed: ${response.status} (${url})`);
  }
  try {
    return (await response.json()) as T;
  } catch (error) {
    throw new SourceError(source, `${source} returned invalid JSON (${url})`, { cause: error });
  }
}
