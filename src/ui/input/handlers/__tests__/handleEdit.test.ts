import {
  contextBeforeCursor,
  createBuffer,
  handleBackspace,
  handleInsertChar,
  handleInsertText,
  handleNewline,
} from '../handleEdit.js';
import { findWrapPoint, wrapLine } from '../handleWrap.js';
import {
  handleCursorDown,
  handleCursorLeft,
  handleCursorRight,
  handleCursorUp,
  handleEnd,
  handleHome,
} from '../handleCursor.js';

describe('buffer editing', () => {
  it('always starts with one empty line', () => {
    expect(createBuffer()).toEqual({ lines: [''], cursorLine: 0, cursorCol: 0 });
    expect(createBuffer([])).toEqual({ lines: [''], cursorLine: 0, cursorCol: 0 });
  });

  it('inserts at the cursor', () => {
    const state = { lines: ['helo'], cursorLine: 0, cursorCol: 3 };
    expect(handleInsertChar(state, 'l', 80)).toEqual({ lines: ['hello'], cursorLine: 0, cursorCol: 4 });
  });

  it('splits the line on newline', () => {
    const state = { lines: ['hello'], cursorLine: 0, cursorCol: 2 };
    expect(handleNewline(state)).toEqual({ lines: ['he', 'llo'], cursorLine: 1, cursorCol: 0 });
  });

  it('treats \\n in inserted text as a newline', () => {
    expect(handleInsertText(createBuffer(), 'ab\ncd', 80)).toEqual({
      lines: ['ab', 'cd'],
      cursorLine: 1,
      cursorCol: 2,
    });
  });

  it('deletes the character before the cursor', () => {
    const state = { lines: ['hello'], cursorLine: 0, cursorCol: 5 };
    expect(handleBackspace(state)).toEqual({ lines: ['hell'], cursorLine: 0, cursorCol: 4 });
  });

  it('joins with the previous line at column 0', () => {
    const state = { lines: ['ab', 'cd'], cursorLine: 1, cursorCol: 0 };
    expect(handleBackspace(state)).toEqual({ lines: ['abcd'], cursorLine: 0, cursorCol: 2 });
  });

  it('leaves the buffer alone at the very start', () => {
    const state = createBuffer(['abc']);
    expect(handleBackspace(state)).toBe(state);
  });
});

describe('line wrapping', () => {
  it('splits after the last space before the overflow column', () => {
    expect(findWrapPoint('hello world again', 8)).toBe(6);
    expect(findWrapPoint('hello world again', 12)).toBe(12);
  });

  it('splits at the overflow column when no space is within the lookback', () => {
    const line = 'a b' + 'c'.repeat(30);
    expect(findWrapPoint(line, 30)).toBe(30);
    expect(findWrapPoint(line, 30, 40)).toBe(2);
  });

  it('moves the overflowing word to a new line while typing', () => {
    const text = 'the quick brown fox jumps';
    const state = handleInsertText(createBuffer(), text, 20);

    expect(state.lines).toEqual(['the quick brown fox ', 'jumps']);
    expect(state.lines.join('')).toBe(text);
    expect(state).toMatchObject({ cursorLine: 1, cursorCol: 5 });
  });

  it('hard-splits a line without spaces', () => {
    const state = handleInsertText(createBuffer(), 'abcdefghijkl', 10);

    expect(state.lines).toEqual(['abcdefghij', 'kl']);
    expect(state).toMatchObject({ cursorLine: 1, cursorCol: 2 });
  });

  it('keeps the cursor on the first line when it is before the split', () => {
    const state = { lines: ['aaaa bbbb'], cursorLine: 0, cursorCol: 2 };

    expect(handleInsertChar(state, 'X', 9)).toEqual({
      lines: ['aaXaa ', 'bbbb'],
      cursorLine: 0,
      cursorCol: 3,
    });
  });

  it('shifts the cursor down when a line above it wraps', () => {
    const state = { lines: ['x'.repeat(12), 'y'], cursorLine: 1, cursorCol: 0 };

    expect(wrapLine(state, 0, 10)).toEqual({
      lines: ['x'.repeat(10), 'xx', 'y'],
      cursorLine: 2,
      cursorCol: 0,
    });
  });

  it('wraps repeatedly until every piece fits', () => {
    const state = { lines: ['z'.repeat(25)], cursorLine: 0, cursorCol: 25 };

    expect(wrapLine(state, 0, 10)).toEqual({
      lines: ['z'.repeat(10), 'z'.repeat(10), 'z'.repeat(5)],
      cursorLine: 2,
      cursorCol: 5,
    });
  });
});

describe('completion context', () => {
  const state = { lines: ['one', 'two', 'three'], cursorLine: 2, cursorCol: 3 };

  it('joins preceding lines with the current line up to the cursor', () => {
    expect(contextBeforeCursor(state, 500, 10)).toBe('one\ntwo\nthr');
  });

  it('keeps only the last characters', () => {
    expect(contextBeforeCursor(state, 5, 10)).toBe('o\nthr');
  });

  it('limits how many preceding lines are used', () => {
    expect(contextBeforeCursor(state, 500, 1)).toBe('two\nthr');
  });
});

describe('cursor movement', () => {
  const state = { lines: ['short', 'a longer line'], cursorLine: 1, cursorCol: 10 };

  it('clamps the column when moving up', () => {
    expect(handleCursorUp(state)).toMatchObject({ cursorLine: 0, cursorCol: 5 });
  });

  it('stays put at the last line', () => {
    expect(handleCursorDown(state)).toBe(state);
  });

  it('continues at the end of the previous line', () => {
    expect(handleCursorLeft({ ...state, cursorCol: 0 })).toMatchObject({ cursorLine: 0, cursorCol: 5 });
  });

  it('continues at the start of the next line', () => {
    expect(handleCursorRight({ ...state, cursorLine: 0, cursorCol: 5 })).toMatchObject({
      cursorLine: 1,
      cursorCol: 0,
    });
  });

  it('jumps to line start and end', () => {
    expect(handleHome(state).cursorCol).toBe(0);
    expect(handleEnd(state).cursorCol).toBe(13);
  });
});
