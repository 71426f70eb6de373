import { SUGGESTION } from './constants.js';
import { ResultSlot } from '../lib/utils/resultSlot.js';
import { logger } from '../lib/utils/logger.js';
import { formatErrorMessage } from '../utils/errors.js';
import { CompletionProvider, CompletionResult, Position } from '../types/index.js';

/**
 * Cursor position and the text before it, captured when a request is
 * dispatched and compared again when its result is consumed
 */
export interface ContextSnapshot {
  position: Position;
  context: string;
}

export interface Suggestion {
  text: string;
  anchor: Position;
  /** Leading characters of `text` already typed by the user */
  matched: number;
}

export type PollOutcome =
  | { kind: 'idle' }
  | { kind: 'shown'; suggestion: Suggestion }
  | { kind: 'empty' }
  | { kind: 'stale' }
  | { kind: 'failed'; result: Extract<CompletionResult, { ok: false }> };

export type InsertOutcome = 'none' | 'matched' | 'completed' | 'cleared';

export interface SuggestionEngineOptions {
  provider: CompletionProvider | null;
  enabled?: boolean;
  pauseDelayMs?: number;
  throttleMs?: number;
  fetchTimeoutMs?: number;
}

interface FetchOutcome {
  snapshot: ContextSnapshot;
  result: CompletionResult;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.line === b.line && a.col === b.col;
}

/**
 * Owns the inline suggestion lifecycle: pause detection, throttled
 * dispatch of one background request at a time, and matching typed
 * characters against the suggestion on screen.
 *
 * Every method that depends on time takes `now` from the caller.
 */
export class SuggestionEngine {
  private provider: CompletionProvider | null;
  private enabled: boolean;
  private pauseDelayMs: number;
  private throttleMs: number;
  private fetchTimeoutMs: number;

  private current: Suggestion | null = null;
  private fetching = false;
  private lastKeystrokeAt: number | null = null;
  private lastDispatchAt: number | null = null;
  private dispatched = 0;
  private slot = new ResultSlot<FetchOutcome>();

  constructor(options: SuggestionEngineOptions) {
    this.provider = options.provider;
    this.enabled = options.enabled ?? true;
    this.pauseDelayMs = options.pauseDelayMs ?? SUGGESTION.PAUSE_DELAY_MS;
    this.throttleMs = options.throttleMs ?? SUGGESTION.THROTTLE_MS;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? SUGGESTION.FETCH_TIMEOUT_MS;
  }

  get suggestion(): Readonly<Suggestion> | null {
    return this.current;
  }

  /** The part of the suggestion still shown as ghost text */
  get remainder(): string {
    return this.current ? this.current.text.slice(this.current.matched) : '';
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get isAvailable(): boolean {
    return this.provider !== null;
  }

  get isFetching(): boolean {
    return this.fetching;
  }

  get requestCount(): number {
    return this.dispatched;
  }

  recordKeystroke(now: number): void {
    this.lastKeystrokeAt = now;
  }

  shouldDispatch(now: number, snapshot: ContextSnapshot): boolean {
    if (!this.enabled || this.provider === null) return false;
    if (this.current !== null || this.fetching) return false;
    if (this.lastKeystrokeAt === null) return false;

    if (now - this.lastKeystrokeAt <= this.pauseDelayMs) return false;
    if (this.lastDispatchAt !== null && now - this.lastDispatchAt < this.throttleMs) return false;

    return snapshot.context.trim() !== '';
  }

  /**
   * Start a background request if the user has paused long enough.
   * Returns true when a request was dispatched.
   */
  maybeDispatch(now: number, snapshot: ContextSnapshot): boolean {
    if (!this.shouldDispatch(now, snapshot) || this.provider === null) {
      return false;
    }

    this.fetching = true;
    this.lastDispatchAt = now;
    this.dispatched += 1;
    logger.debug('Dispatching completion request', { position: snapshot.position });

    void this.runFetch(this.provider, { position: { ...snapshot.position }, context: snapshot.context });
    return true;
  }

  /**
   * Runs detached from the main loop. Only ever writes the result slot.
   */
  private async runFetch(provider: CompletionProvider, snapshot: ContextSnapshot): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<CompletionResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ ok: false, reason: 'timeout', message: 'Completion request timed out' }),
        this.fetchTimeoutMs
      );
    });

    try {
      const result = await Promise.race([provider.complete(snapshot.context, this.fetchTimeoutMs), timeout]);
      this.slot.put({ snapshot, result });
    } catch (error) {
      this.slot.put({
        snapshot,
        result: { ok: false, reason: 'network', message: formatErrorMessage(error) },
      });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Drain the result slot once. A result is only shown if the cursor and
   * the text before it are still what they were at dispatch time.
   */
  poll(current: ContextSnapshot): PollOutcome {
    const outcome = this.slot.take();
    if (outcome === undefined) {
      return { kind: 'idle' };
    }

    this.fetching = false;
    const { snapshot, result } = outcome;

    if (!result.ok) {
      logger.debug('No suggestion', { reason: result.reason });
      return { kind: 'failed', result };
    }

    if (
      !this.enabled ||
      this.current !== null ||
      !samePosition(snapshot.position, current.position) ||
      snapshot.context !== current.context
    ) {
      logger.debug('Discarding stale suggestion');
      return { kind: 'stale' };
    }

    if (result.text === '') {
      return { kind: 'empty' };
    }

    this.current = { text: result.text, anchor: { ...snapshot.position }, matched: 0 };
    return { kind: 'shown', suggestion: this.current };
  }

  /**
   * Called after a single character was inserted. `before` and `after` are
   * the cursor positions around the insertion (they differ by more than one
   * column when the line wrapped).
   */
  onCharInserted(char: string, before: Position, after: Position): InsertOutcome {
    const suggestion = this.current;
    if (suggestion === null) {
      return 'none';
    }

    const { anchor, matched, text } = suggestion;
    const expected = { line: anchor.line, col: anchor.col + matched };
    if (!samePosition(before, expected) || text[matched] !== char) {
      this.current = null;
      return 'cleared';
    }

    const next = matched + 1;
    if (next >= text.length) {
      this.current = null;
      return 'completed';
    }

    if (!samePosition(after, { line: anchor.line, col: anchor.col + next })) {
      this.current = null;
      return 'cleared';
    }

    this.current = { ...suggestion, matched: next };
    return 'matched';
  }

  /**
   * Drop the suggestion after an edit or movement it cannot survive.
   * Returns true when there was one.
   */
  invalidate(): boolean {
    const had = this.current !== null;
    this.current = null;
    return had;
  }

  /**
   * Take the unmatched remainder for insertion and clear the suggestion
   */
  accept(): string | null {
    if (this.current === null) {
      return null;
    }
    const remaining = this.remainder;
    this.current = null;
    return remaining === '' ? null : remaining;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.current = null;
    }
  }

  toggle(): boolean {
    this.setEnabled(!this.enabled);
    return this.enabled;
  }
}
