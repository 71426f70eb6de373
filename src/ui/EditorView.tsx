import React from 'react';
import { Box, Text } from 'ink';
import chalk from 'chalk';
import { Frame, Segment } from './render.js';
import { StatusTone } from '../types/index.js';

interface EditorViewProps {
  frame: Frame;
}

function paintSegment(segment: Segment): string {
  switch (segment.style) {
    case 'cursor':
      return chalk.inverse(segment.text);
    case 'ghost':
      return chalk.cyan.dim(segment.text);
    case 'ghostCursor':
      return chalk.inverse.cyan(segment.text);
    default:
      return segment.text;
  }
}

const toneColor = (tone: StatusTone) => {
  switch (tone) {
    case 'error':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
    default:
      return chalk.white;
  }
};

export const EditorView: React.FC<EditorViewProps> = ({ frame }) => {
  return (
    <Box flexDirection="column">
      {frame.rows.map((segments, index) => (
        <Text key={index} wrap="truncate">
          {segments.length > 0 ? segments.map(paintSegment).join('') : ' '}
        </Text>
      ))}
      <Text wrap="truncate">{chalk.bgWhite.black(frame.status)}</Text>
      <Text wrap="truncate">{frame.message ? toneColor(frame.message.tone)(frame.message.text) : ' '}</Text>
      <Text wrap="truncate">{chalk.yellow(frame.help)}</Text>
    </Box>
  );
};
