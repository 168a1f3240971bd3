export const DATE_TOKEN = "{{cs371date}}";
export const SERVER_TOKEN = "{{cs371server}}";

export interface TemplateValues {
  /** Replaces every date token. */
  date: string;
  /** Replaces every server token. */
  server: string;
}

/** Substitute every placeholder token in a landing page template. */
export function renderTemplate(source: string, values: TemplateValues): string {
  return source
    .replaceAll(DATE_TOKEN, () => values.date)
    .replaceAll(SERVER_TOKEN, () => values.server);
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTemplateTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatServerIdentity(
  userName: string,
  hostAddress: string,
): string {
  return `${userName} on ${hostAddress}`;
}
