import type { Place } from "./place.js";
import type { Marking } from "./types.js";

/** Non-empty places as `name:count`, comma separated. */
export function formatMarking(marking: Marking): string {
  return Object.entries(marking)
    .filter(([, v]) => v > 0)
    .map(([k, v]) => `${k}:${v}`)
    .join(", ");
}

/** One line per place with its token counts grouped by type. */
export function formatStatus(title: string, places: Iterable<Place>): string {
  const lines = [`=== ${title} (grouped) ===`];
  for (const place of places) {
    const summary = [...place.countByType()]
      .map(([type, count]) => `${type}:${count}`)
      .join(", ");
    lines.push(`${place.name.padEnd(20)}: ${summary || "(empty)"}`);
  }
  return lines.join("\n");
}
