/**
 * formatCreatedAt renders a stored ISO timestamp as "YYYY-MM-DD HH:MM UTC".
 * Values that do not parse are shown as stored.
 */
export function formatCreatedAt(iso: string): string {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) return iso;
  const d = new Date(ms).toISOString();
  return `${d.slice(0, 10)} ${d.slice(11, 16)} UTC`;
}
