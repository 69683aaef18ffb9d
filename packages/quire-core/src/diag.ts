/**
 * Diagnostics - structured errors and warnings
 *
 * Every fatal condition the core can hit is a subclass of QuireError. They
 * all carry an optional source span and hints so that a CLI or editor can
 * show them to the end user without further context.
 */

/**
 * Source span attached to content, rules and diagnostics.
 * Assigned by the external parser; the core only passes it through.
 */
export interface Span {
  file: string;
  line: number;
  column: number;
}

export type Severity = 'error' | 'warning';

/**
 * Structured diagnostic, consumed by an external CLI or editor
 */
export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span | null;
  hints: string[];
}

/**
 * Format a span as `file:line:column`
 */
export function formatSpan(span: Span | null): string {
  if (!span) return '<unknown>';
  return `${span.file}:${span.line}:${span.column}`;
}

/**
 * Base class for all fatal core errors
 */
export abstract class QuireError extends Error {
  readonly span: Span | null;
  readonly hints: string[];

  constructor(message: string, span: Span | null = null, hints: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.span = span;
    this.hints = hints;
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: 'error',
      message: this.message,
      span: this.span,
      hints: [...this.hints],
    };
  }
}

/**
 * Invalid style property, or a property used where it is not allowed
 * (page configuration inside a container, for instance).
 */
export class StyleError extends QuireError {}

/**
 * Selector that targets an unsupported kind or is used where it cannot be
 */
export class SelectorError extends QuireError {}

/**
 * A show rule kept matching the content it produced
 */
export class RecursionError extends QuireError {
  constructor(
    message: string,
    span: Span | null,
    readonly ruleId: number
  ) {
    super(message, span, ['check whether the show rule returns an element it matches itself']);
  }
}

/**
 * The fixed-point driver ran out of passes
 */
export class ConvergenceError extends QuireError {
  constructor(
    readonly passes: number,
    readonly locations: string[]
  ) {
    super(
      `document did not converge within ${passes} attempts`,
      null,
      locations.length > 0
        ? [`layout kept changing at: ${locations.join(', ')}`]
        : ['introspection results kept changing between passes']
    );
  }
}

/**
 * A label or location lookup found nothing, or more than one element
 */
export class IntrospectionMiss extends QuireError {}

/**
 * Compilation was aborted between two passes
 */
export class CompileAbortedError extends QuireError {
  constructor(readonly completedPasses: number) {
    super(`compilation aborted after ${completedPasses} pass(es)`);
  }
}

/**
 * Non-fatal: unbreakable content does not fit into any region and overflows
 */
export class LayoutOverflowWarning {
  readonly severity = 'warning' as const;

  constructor(
    readonly message: string,
    readonly span: Span | null = null
  ) {}

  toDiagnostic(): Diagnostic {
    return {
      severity: 'warning',
      message: this.message,
      span: this.span,
      hints: ['the content is drawn past the region boundary'],
    };
  }
}
