/**
 * Message templates for task outcomes. Bodies are Markdown, which the
 * service renders in the message detail page.
 */

export interface NotificationTemplate {
  title: string;
  content: string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatDuration = (seconds: number): string => `${seconds.toFixed(2)} s`;

export const templates = {
  success(taskName: string, executionTime?: number, details?: string, now: Date = new Date()): NotificationTemplate {
    const lines = [
      '## 🎉 Task succeeded',
      '',
      `**Task**: ${taskName}`,
      '',
      `**Finished at**: ${formatTimestamp(now)}`
    ];
    if (executionTime !== undefined) lines.push('', `**Duration**: ${formatDuration(executionTime)}`);
    if (details) lines.push('', '**Details**:', details);
    return { title: `✅ ${taskName} succeeded`, content: lines.join('\n') };
  },

  error(taskName: string, errorMessage: string, executionTime?: number, now: Date = new Date()): NotificationTemplate {
    const lines = [
      '## ⚠️ Task failed',
      '',
      `**Task**: ${taskName}`,
      '',
      `**Failed at**: ${formatTimestamp(now)}`,
      '',
      `**Error**: ${errorMessage}`
    ];
    if (executionTime !== undefined) lines.push('', `**Duration**: ${formatDuration(executionTime)}`);
    return { title: `❌ ${taskName} failed`, content: lines.join('\n') };
  }
};
