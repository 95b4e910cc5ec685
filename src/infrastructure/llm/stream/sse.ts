/**
 * Extracts the event payloads of a fully buffered server-sent event body,
 * stopping at `[DONE]`. Consecutive `data:` lines up to a blank line form one
 * payload, joined with `\n`; comments and other fields are skipped.
 */
export function parseSseText(body: string): string[] {
  const events: string[] = [];
  let data: string[] | undefined;

  // The trailing "" dispatches a final event that has no blank line after it.
  for (const line of [...body.split(/\r\n|\r|\n/), ""]) {
    if (line === "") {
      if (!data) continue;
      const payload = data.join("\n");
      data = undefined;
      if (payload === "[DONE]") break;
      events.push(payload);
      continue;
    }
    if (!line.startsWith("data:")) continue;
    const value = line.slice("data:".length);
    (data ??= []).push(value.startsWith(" ") ? value.slice(1) : value);
  }
  return events;
}
