import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import {
  TemplateResolutionError,
  toDate,
  validationError,
  z,
} from "@folio/utils";
import type { SiteModel } from "../types";

// Years arrive as numbers, full dates as Date
const periodSchema = z
  .union([z.string(), z.number(), z.date()])
  .transform((value) => {
    if (value instanceof Date) {
      const date = toDate(value);
      return date ? String(date.getUTCFullYear()) : "";
    }
    return String(value);
  });

export const timelineEntrySchema = z.object({
  title: z.string(),
  from: periodSchema.optional(),
  to: periodSchema.optional(),
  description: z.string().optional(),
});

export type TimelineEntry = z.output<typeof timelineEntrySchema>;

function TimelineList({ entries }: { entries: TimelineEntry[] }): JSX.Element {
  return (
    <ul className="timeline">
      {entries.map((entry, index) => (
        <li key={index} className="timeline-entry">
          <h3 className="timeline-title">{entry.title}</h3>
          {(entry.from ?? entry.to) && (
            <span className="timeline-period">
              {entry.from ?? ""} – {entry.to ?? "Present"}
            </span>
          )}
          {entry.description && (
            <p className="timeline-description">{entry.description}</p>
          )}
        </li>
      ))}
    </ul>
  );
}

/**
 * `{% include timeline.html %}`: renders `site.data.timeline`, or the
 * data file named by a `data` parameter
 */
export function renderTimeline(
  site: SiteModel,
  params: Record<string, unknown>,
): string {
  const key = typeof params["data"] === "string" ? params["data"] : "timeline";
  const raw = site.data[key] ?? [];
  const parsed = z.array(timelineEntrySchema).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new TemplateResolutionError(
      validationError(`site.data.${key}`, issues),
      { include: "timeline", data: key },
    );
  }
  return render(<TimelineList entries={parsed.data} />);
}
