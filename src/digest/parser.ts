import { decodeEntities, stripInlineHtml } from "../utils/html.js";

export interface StoryFragment {
  ordinal: number;
  title: string;
  body: string;
}

interface Marker {
  ordinal: number;
  title: string;
  start: number;
  end: number;
}

// "3. Headline" on its own line, optionally wrapped in <strong ...>
const MARKER_SOURCE = String.raw`^[ \t]*(?:<(?:strong|b)[^>]*>[ \t]*)?(\d{1,3})\.[ \t]+(.+?)[ \t]*$`;

function cleanBody(text: string): string {
  return decodeEntities(
    text
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<[^>]+>/g, "")
  )
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function findMarkers(text: string): Marker[] {
  const markers: Marker[] = [];
  const seen = new Set<number>();
  const markerRegex = new RegExp(MARKER_SOURCE, "gm");
  let match: RegExpExecArray | null;

  while ((match = markerRegex.exec(text)) !== null) {
    const ordinal = Number(match[1]);

    // A repeated ordinal would collide with an earlier story's record id
    if (seen.has(ordinal)) continue;
    seen.add(ordinal);

    markers.push({
      ordinal,
      title: stripInlineHtml(match[2]),
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return markers;
}

function singleFragment(text: string): StoryFragment {
  const lines = cleanBody(text).split("\n");
  const firstLine = lines.findIndex((line) => line.length > 0);

  if (firstLine === -1) {
    return { ordinal: 1, title: "", body: "" };
  }

  return {
    ordinal: 1,
    title: lines[firstLine],
    body: lines.slice(firstLine + 1).join("\n").trim(),
  };
}

/**
 * Split a digest enrichment into numbered stories.
 *
 * Ordinals come straight from the markers, so a model that skips from 2 to 5
 * yields ordinals 1, 2, 5. Text before the first marker is dropped. Without
 * any marker the whole text becomes one story titled by its first line; the
 * result is never empty.
 */
export function parseDigest(enrichmentText: string): StoryFragment[] {
  const text = enrichmentText.replace(/\r\n?/g, "\n");
  const markers = findMarkers(text);

  if (markers.length === 0) {
    return [singleFragment(text)];
  }

  return markers.map((marker, index) => {
    const bodyEnd = index + 1 < markers.length ? markers[index + 1].start : text.length;
    return {
      ordinal: marker.ordinal,
      title: marker.title,
      body: cleanBody(text.slice(marker.end, bodyEnd)),
    };
  });
}
