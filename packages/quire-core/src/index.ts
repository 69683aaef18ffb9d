/**
 * Quire Core - style resolution and introspective layout
 *
 * This is the core library containing:
 * - Content model and element registry
 * - Style chain (set and show rules)
 * - Selector matcher and realizer
 * - Introspector (locations, counters, state, queries)
 * - Region/frame layout engine
 * - Fixed-point driver and the frame builder interface
 */

export * from './diag.js';

// Content
export * from './content/content.js';
export * from './content/value.js';
export {
  ElementRegistry,
  resolveField,
  resolveProperty,
  isNumber,
  isNonNegative,
  isBool,
  isStr,
  isContentValue,
  orNone,
  oneOf,
} from './content/elements.js';
export type { ElementKind, ParamSpec, Display, ImplicitCounter, FieldResolver } from './content/elements.js';

// Styles and selectors
export { StyleArena, StyleChain } from './style/chain.js';
export { set, setIf, show, showContent, showSet, describeEntry } from './style/styles.js';
export type { PropertyEntry, ShowEntry, ShowFunc, ShowTransform, StyleEntry } from './style/styles.js';
export * from './selector/selector.js';
export { matchNode, findTextMatches, validateSelector } from './selector/matcher.js';
export type { Match, MatchEnv, TextMatch } from './selector/matcher.js';

// Introspection
export { Location, Locator } from './introspect/location.js';
export { Introspector } from './introspect/introspector.js';
export type { CounterView, LocatedElement, Position, StateView } from './introspect/introspector.js';
export * from './introspect/counter.js';
export * from './introspect/state.js';

// Realization
export { Realizer } from './realize/realizer.js';
export { ContextFunc, ContextMemo, context, evaluateContext } from './realize/context.js';
export type { ContextApi, CounterApi, DateParts, StateApi, Target } from './realize/context.js';
export { NumberingPattern, applyNumbering, isNumbering } from './realize/numbering.js';
export { FlowBuilder } from './realize/flow.js';
export type { FlowItem, FontSpec, InlineItem, PageConfig, Spacing, Tag } from './realize/flow.js';
export { asContent, boolField, contentField, numberField, optionalNumber, stringField } from './realize/look.js';
export type { Look, LookContext } from './realize/look.js';
export { resolvePageConfig } from './realize/page-config.js';

// Layout
export { Frame, serializePage } from './layout/frame.js';
export type { DrawnShape, FrameItem, Page } from './layout/frame.js';
export { MonospaceMeasurer } from './layout/measure.js';
export type { TextMeasurer } from './layout/measure.js';
export { layoutPages, splitRuns } from './layout/pages.js';

// Library and driver
export { STANDARD_KINDS, standardRegistry } from './library/index.js';
export { Engine } from './engine/engine.js';
export type { EngineOptions, Measurement } from './engine/engine.js';
export { DEFAULT_MAX_PASSES, compile } from './engine/compile.js';
export type { CompileOptions, CompiledDocument } from './engine/compile.js';
export { emitDocument } from './output.js';
export type { Anchor, FrameBuilder, PageInfo } from './output.js';
