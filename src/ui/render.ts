import { EDITOR, HELP_TEXT } from '../modules/constants.js';
import { EditorSession } from '../modules/session.js';
import { StatusTone } from '../types/index.js';

export interface Viewport {
  columns: number;
  rows: number;
}

export type SegmentStyle = 'text' | 'cursor' | 'ghost' | 'ghostCursor';

export interface Segment {
  text: string;
  style: SegmentStyle;
}

export interface Frame {
  rows: Segment[][];
  status: string;
  message: { text: string; tone: StatusTone } | null;
  help: string;
  scrollTop: number;
}

export function textAreaHeight(viewport: Viewport): number {
  return Math.max(1, viewport.rows - EDITOR.CHROME_ROWS);
}

/**
 * Keep the cursor line inside the visible window with minimal scrolling
 */
export function computeScrollTop(previousTop: number, cursorLine: number, height: number): number {
  if (cursorLine < previousTop) {
    return cursorLine;
  }
  if (cursorLine >= previousTop + height) {
    return cursorLine - height + 1;
  }
  return previousTop;
}

function truncateSegments(segments: Segment[], width: number): Segment[] {
  const result: Segment[] = [];
  let used = 0;
  for (const segment of segments) {
    if (used >= width) break;
    const text = segment.text.slice(0, width - used);
    result.push({ ...segment, text });
    used += text.length;
  }
  return result;
}

/**
 * Lay out one text row. On the cursor row the ghost text is drawn at the
 * cursor and the rest of the line follows it.
 */
export function layoutLine(line: string, width: number, cursorCol: number | null, ghost = ''): Segment[] {
  if (cursorCol === null) {
    return truncateSegments([{ text: line, style: 'text' }], width);
  }

  const before = line.slice(0, cursorCol);
  const after = line.slice(cursorCol);
  const ghostLine = ghost.split('\n')[0];
  const segments: Segment[] = [];

  if (before !== '') {
    segments.push({ text: before, style: 'text' });
  }

  if (ghostLine !== '') {
    segments.push({ text: ghostLine[0], style: 'ghostCursor' });
    if (ghostLine.length > 1) {
      segments.push({ text: ghostLine.slice(1), style: 'ghost' });
    }
    if (after !== '') {
      segments.push({ text: after, style: 'text' });
    }
  } else {
    segments.push({ text: after[0] ?? ' ', style: 'cursor' });
    if (after.length > 1) {
      segments.push({ text: after.slice(1), style: 'text' });
    }
  }

  return truncateSegments(segments, width);
}

export function aiLabel(session: EditorSession): string {
  const engine = session.suggestions;
  if (!engine.isAvailable) return 'Not configured';
  if (!engine.isEnabled) return 'Disabled';
  return engine.isFetching ? 'Thinking' : 'Enabled';
}

export function formatStatusLine(session: EditorSession, width: number): string {
  const { buffer } = session;
  let text = ` ${session.filename ?? '[No Name]'} `;
  if (session.modified) {
    text += '[Modified] ';
  }
  text += `| Line ${buffer.cursorLine + 1}/${buffer.lines.length} Col ${buffer.cursorCol + 1}`;
  text += ` | AI: ${aiLabel(session)}`;
  return text.slice(0, width).padEnd(width);
}

export function buildFrame(
  session: EditorSession,
  viewport: Viewport,
  now: number,
  previousScrollTop = 0
): Frame {
  const height = textAreaHeight(viewport);
  const { buffer } = session;
  const scrollTop = computeScrollTop(previousScrollTop, buffer.cursorLine, height);
  const commandMode = session.commandState.kind === 'command';
  const ghost = session.suggestions.remainder;

  const rows: Segment[][] = [];
  for (let i = 0; i < height; i++) {
    const index = scrollTop + i;
    if (index >= buffer.lines.length) {
      rows.push([]);
      continue;
    }

    const isCursorRow = index === buffer.cursorLine && !commandMode;
    rows.push(
      layoutLine(buffer.lines[index], viewport.columns, isCursorRow ? buffer.cursorCol : null, isCursorRow ? ghost : '')
    );
  }

  let message: Frame['message'] = null;
  if (session.commandState.kind === 'command') {
    message = { text: `${EDITOR.COMMAND_TRIGGER}${session.commandState.text}`, tone: 'info' };
  } else {
    const status = session.statusAt(now);
    if (status !== null) {
      message = { text: status.text.slice(0, viewport.columns), tone: status.tone };
    }
  }

  return {
    rows,
    status: formatStatusLine(session, viewport.columns),
    message,
    help: HELP_TEXT.slice(0, viewport.columns),
    scrollTop,
  };
}
