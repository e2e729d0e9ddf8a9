import { TITLE_MAX_LENGTH } from "../domain/models/bookmark";
import { IOError, ValidationError } from "../domain/models/errors";
import { truncateWithEllipsis } from "../domain/services/text";

const STOP_MARKERS = ["</title>", "</header>"];

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&#x27;": "'",
  "&nbsp;": " "
};

export interface FetchPageTitleOptions {
  userAgent: string;
  fetchImpl?: typeof fetch;
}

function containsStopMarker(text: string): boolean {
  const lowered = text.toLowerCase();
  return STOP_MARKERS.some((marker) => lowered.includes(marker));
}

function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|nbsp|#39|#x27);/gi, (entity) => {
    return HTML_ENTITIES[entity.toLowerCase()] ?? entity;
  });
}

/**
 * Text between the first `<title>` and `</title>`, whitespace collapsed and
 * cut to the title length limit.
 */
export function extractPageTitle(html: string): string {
  const open = /<title(\s[^>]*)?>/i.exec(html);
  const closeIndex = html.search(/<\/title>/i);

  if (!open) {
    throw new ValidationError("Page has no <title> tag");
  }

  if (closeIndex < 0) {
    throw new ValidationError("Page has no </title> tag");
  }

  const start = open.index + open[0].length;
  if (closeIndex < start) {
    throw new ValidationError("Page has </title> before <title>");
  }

  const title = decodeEntities(html.slice(start, closeIndex)).replace(/\s+/g, " ").trim();
  return truncateWithEllipsis(title, TITLE_MAX_LENGTH);
}

/**
 * Reads the response body until the title (or the end of the page header)
 * has been seen. The rest of the download is cancelled.
 */
export async function readPageHead(response: Response): Promise<string> {
  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = "";
  let finished = false;

  try {
    while (!containsStopMarker(text)) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      text += decoder.decode(value, { stream: true });
    }

    return text + decoder.decode();
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        console.warn("Failed to cancel page download", error);
      });
    }
    reader.releaseLock();
  }
}

export async function fetchPageTitle(
  url: string,
  options: FetchPageTitleOptions
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let response: Response;

  try {
    response = await fetchImpl(url, {
      redirect: "follow",
      headers: { "User-Agent": options.userAgent }
    });
  } catch (error) {
    throw new IOError(`Could not download ${url}`, { cause: error });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new IOError(`Downloading ${url} failed with status ${response.status}`);
  }

  let head: string;
  try {
    head = await readPageHead(response);
  } catch (error) {
    throw new IOError(`Could not read ${url}`, { cause: error });
  }

  return extractPageTitle(head);
}
