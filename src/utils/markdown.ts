/**
 * Escape user-controlled text for Telegram's legacy Markdown parse mode
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

/**
 * Render a timestamp as "YYYY-MM-DD HH:MM:SS" (UTC)
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Render the date part of a timestamp as "YYYY-MM-DD" (UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
