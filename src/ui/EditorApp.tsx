import React, { useEffect, useReducer, useRef, useState } from 'react';
import { Key, useApp, useInput, useStdout } from 'ink';
import { EDITOR } from '../modules/constants.js';
import { EditorSession } from '../modules/session.js';
import { resolveCommand } from './input/keyMatchers.js';
import { buildFrame, Viewport } from './render.js';
import { EditorView } from './EditorView.js';

interface EditorAppProps {
  session: EditorSession;
  clock?: () => number;
  tickMs?: number;
}

function readViewport(stdout: NodeJS.WriteStream): Viewport {
  return {
    columns: stdout.columns || 80,
    rows: stdout.rows || 24,
  };
}

/**
 * Full-screen editor. A fixed-cadence interval drives the session's main
 * loop; key presses are routed to it as they arrive.
 */
export const EditorApp: React.FC<EditorAppProps> = ({
  session,
  clock = Date.now,
  tickMs = EDITOR.TICK_MS,
}) => {
  const { exit } = useApp();
  const stdout = useStdout().stdout ?? process.stdout;
  const [viewport, setViewport] = useState<Viewport>(() => readViewport(stdout));
  const [, redraw] = useReducer((count: number) => count + 1, 0);
  const scrollTop = useRef(0);

  useEffect(() => {
    const onResize = () => setViewport(readViewport(stdout));
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    session.setColumns(viewport.columns);
  }, [session, viewport.columns]);

  useEffect(() => {
    const interval = setInterval(() => {
      session.tick(clock());
      redraw();
    }, tickMs);

    return () => clearInterval(interval);
  }, [session, clock, tickMs]);

  useInput((input: string, key: Key) => {
    const command = resolveCommand(key, input);
    if (command === null) return;

    session.handleCommand(command, input, clock());
    if (session.terminated) {
      exit();
      return;
    }
    redraw();
  });

  const frame = buildFrame(session, viewport, clock(), scrollTop.current);
  scrollTop.current = frame.scrollTop;

  return <EditorView frame={frame} />;
};
