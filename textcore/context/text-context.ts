import { BUFFER_LEN } from '../buffer/limits';
import { DiagnosticCode, type DiagnosticHandler } from './diagnostics';

/**
 * Minimal surface of the grapheme break classifier. Intl.Segmenter satisfies
 * it; tests may substitute anything that yields segment start indexes.
 */
export interface GraphemeSegmenter {
  segment(input: string): Iterable<{ index: number; segment: string }>;
}

/** Minimal surface of the locale collator. */
export interface TextCollator {
  compare(a: string, b: string): number;
}

export interface TextContextOptions {
  /** BCP 47 locale for collation and segmentation; host default when omitted. */
  locale?: string;

  /** Byte limit of every string builder created from this context. */
  stringLimit?: number;

  /** Receives diagnostics from conversions, collation and string builders. */
  onDiagnostic?: DiagnosticHandler;

  /** Replaces the Intl.Segmenter classifier. */
  segmenter?: GraphemeSegmenter;

  /** Replaces the Intl.Collator; `null` forces the byte-order fallback. */
  collator?: TextCollator | null;
}

/**
 * Explicitly owned helper context: the grapheme classifier, the collator and
 * the string builder limit. Both Intl objects are created on first use and
 * reused afterwards.
 */
export interface TextContext {
  readonly locale: string | undefined;
  readonly stringLimit: number;

  /** Grapheme classifier, created on first call. */
  segmenter(): GraphemeSegmenter;

  /** Locale collator, created on first call; undefined when unavailable. */
  collator(): TextCollator | undefined;

  /** Forward a diagnostic to the configured handler, if any. */
  report(code: DiagnosticCode, message: string): void;

  /** Replace the diagnostic handler. */
  setOnDiagnostic(handler: DiagnosticHandler | undefined): void;

  fillDebugState(state: Partial<TextContextDebugState>): void;
}

export interface TextContextDebugState {
  segmenterCreated: boolean;
  collatorCreated: boolean;
  collatorUnavailable: boolean;
  diagnosticCount: number;
}

export function createTextContext(options: TextContextOptions = {}): TextContext {
  const locale = options.locale;
  const stringLimit = options.stringLimit ?? BUFFER_LEN;
  if (!Number.isSafeInteger(stringLimit) || stringLimit < 1)
    throw new Error('TextContext: stringLimit must be a positive integer');

  let onDiagnostic = options.onDiagnostic;
  let diagnosticCount = 0;

  let segmenterInstance: GraphemeSegmenter | undefined = options.segmenter;
  let segmenterCreated = false;

  // undefined: not attempted yet, null: attempted and unavailable
  let collatorInstance: TextCollator | null | undefined = options.collator;
  let collatorCreated = false;

  function report(code: DiagnosticCode, message: string): void {
    diagnosticCount++;
    if (onDiagnostic) onDiagnostic(code, message);
  }

  function segmenter(): GraphemeSegmenter {
    if (!segmenterInstance) {
      segmenterInstance = new Intl.Segmenter(locale, { granularity: 'grapheme' });
      segmenterCreated = true;
    }
    return segmenterInstance;
  }

  function collator(): TextCollator | undefined {
    if (collatorInstance === undefined) {
      try {
        collatorInstance = new Intl.Collator(locale);
        collatorCreated = true;
      } catch (err) {
        collatorInstance = null;
        report(DiagnosticCode.CollatorUnavailable,
          'Unable to open collator: ' + (err instanceof Error ? err.message : String(err)));
      }
    }
    return collatorInstance ?? undefined;
  }

  function setOnDiagnostic(handler: DiagnosticHandler | undefined): void {
    onDiagnostic = handler;
  }

  function fillDebugState(state: Partial<TextContextDebugState>): void {
    state.segmenterCreated = segmenterCreated;
    state.collatorCreated = collatorCreated;
    state.collatorUnavailable = collatorInstance === null;
    state.diagnosticCount = diagnosticCount;
  }

  return {
    locale,
    stringLimit,
    segmenter,
    collator,
    report,
    setOnDiagnostic,
    fillDebugState,
  };
}
