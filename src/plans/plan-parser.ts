/**
 * Extracts numbered subtasks ("1. ...", "2) ...") from generated plan text.
 */

const NUMBERED_LINE = /^\s*\d+[.):]?\s+(.+?)\s*$/;

export function parsePlan(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  const subtasks: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = NUMBERED_LINE.exec(line);
    if (match) {
      // drop markdown emphasis around the step
      const step = match[1].replace(/^\*\*(.+)\*\*$/, '$1').trim();
      if (step.length > 0) subtasks.push(step);
    }
  }
  return subtasks;
}
