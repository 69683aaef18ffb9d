/**
 * JSON document and stylesheet loader
 *
 * Documents are JSON trees of content: strings are text, arrays are
 * sequences, and objects are elements, styled content or metadata markers.
 * Schemas transform straight into core content, selectors and style entries.
 *
 *   { "element": "heading", "fields": { "body": "Intro" }, "label": "intro" }
 *   { "styled": [...], "styles": [{ "set": "text", "properties": { "size": 12 } }] }
 *   { "metadata": { "draft": true } }
 *
 * Field values are JSON scalars, arrays, dictionaries, nested content, or
 * `{ "selector": ... }` for selector-valued fields.
 */

import * as fs from 'fs';
import { z } from 'zod';
import {
  type Content,
  type ContentLike,
  type FieldValue,
  type PropertyEntry,
  type Selector,
  type StyleEntry,
  afterSelector,
  andSelector,
  beforeSelector,
  kindSelector,
  labelSelector,
  makeElement,
  makeMetadata,
  makeStyled,
  orSelector,
  regexSelector,
  set,
  show,
  showContent,
  showSet,
  textSelector,
  toContent,
  whereSelector,
} from 'quire-core';

export interface LoadedDocument {
  content: Content;
  styles: StyleEntry[];
}

/**
 * Malformed input file; hints list every schema violation
 */
export class DocumentLoadError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly hints: string[] = []
  ) {
    super(`${file}: ${message}`);
    this.name = 'DocumentLoadError';
  }
}

// Keys that mark an object as content or a selector rather than a dictionary
const RESERVED_KEYS = ['element', 'styled', 'metadata', 'selector'];

const fieldSchema: z.ZodType<FieldValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(fieldSchema),
    elementSchema,
    styledSchema,
    metadataSchema,
    z.object({ selector: selectorSchema }).strict().transform(value => value.selector),
    z
      .record(fieldSchema)
      .refine(dict => !RESERVED_KEYS.some(key => key in dict), {
        message: `dictionaries cannot use the keys ${RESERVED_KEYS.join(', ')}`,
      }),
  ])
);

const fieldsSchema = z.record(fieldSchema);

const selectorSchema: z.ZodType<Selector, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z
      .object({ kind: z.string(), where: fieldsSchema.optional() })
      .strict()
      .transform(value => (value.where ? whereSelector(value.kind, value.where) : kindSelector(value.kind))),
    z.object({ text: z.string() }).strict().transform(value => textSelector(value.text)),
    z
      .object({ regex: z.string(), flags: z.string().optional() })
      .strict()
      .transform((value, ctx) => {
        try {
          return regexSelector(new RegExp(value.regex, value.flags));
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : `invalid regex ${value.regex}`,
          });
          return z.NEVER;
        }
      }),
    z.object({ label: z.string() }).strict().transform(value => labelSelector(value.label)),
    z.object({ or: z.array(selectorSchema).min(1) }).strict().transform(value => orSelector(...value.or)),
    z.object({ and: z.array(selectorSchema).min(1) }).strict().transform(value => andSelector(...value.and)),
    z
      .object({ before: selectorSchema, end: selectorSchema, inclusive: z.boolean().default(true) })
      .strict()
      .transform(value => beforeSelector(value.before, value.end, value.inclusive)),
    z
      .object({ after: selectorSchema, start: selectorSchema, inclusive: z.boolean().default(true) })
      .strict()
      .transform(value => afterSelector(value.after, value.start, value.inclusive)),
  ])
);

const contentLikeSchema: z.ZodType<ContentLike, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([z.string(), z.null(), z.array(contentLikeSchema), elementSchema, styledSchema, metadataSchema])
);

const contentSchema: z.ZodType<Content, z.ZodTypeDef, unknown> = z.lazy(() =>
  contentLikeSchema.transform(like => toContent(like))
);

const elementSchema: z.ZodType<Content, z.ZodTypeDef, unknown> = z
  .object({
    element: z.string().min(1),
    fields: fieldsSchema.default({}),
    label: z.string().min(1).optional(),
  })
  .strict()
  .transform(value => makeElement(value.element, value.fields, { label: value.label ?? null }));

const metadataSchema: z.ZodType<Content, z.ZodTypeDef, unknown> = z
  .object({ metadata: fieldSchema, label: z.string().min(1).optional() })
  .strict()
  .transform(value => makeMetadata(value.metadata, value.label ?? null));

const setRuleSchema: z.ZodType<PropertyEntry[], z.ZodTypeDef, unknown> = z
  .object({ set: z.string().min(1), properties: fieldsSchema })
  .strict()
  .transform(value => set(value.set, value.properties));

const showTargetSchema = selectorSchema.nullable();

const styleSchema: z.ZodType<StyleEntry[], z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    setRuleSchema,
    z
      .object({ show: showTargetSchema, replace: contentSchema })
      .strict()
      .transform(value => [showContent(value.show, value.replace)]),
    z
      .object({ show: showTargetSchema, with: z.array(setRuleSchema) })
      .strict()
      .transform(value => [showSet(value.show, value.with.flat())]),
    // Wrap each match into a new element, e.g. every strong into an emph
    z
      .object({
        show: showTargetSchema,
        wrap: z.string().min(1),
        into: z.string().min(1).default('body'),
        fields: fieldsSchema.default({}),
      })
      .strict()
      .transform(value => [
        show(value.show, it => makeElement(value.wrap, { ...value.fields, [value.into]: it })),
      ]),
  ])
);

const stylesSchema = z.array(styleSchema).transform(list => list.flat());

const styledSchema: z.ZodType<Content, z.ZodTypeDef, unknown> = z
  .object({ styled: contentSchema, styles: stylesSchema })
  .strict()
  .transform(value => makeStyled(value.styled, value.styles));

const documentSchema = z.union([
  z.object({ content: contentSchema, styles: stylesSchema.default([]) }).strict(),
  contentSchema.transform(content => ({ content, styles: [] })),
]);

const stylesheetSchema = z.union([
  stylesSchema,
  z.object({ styles: stylesSchema }).strict().transform(value => value.styles),
]);

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DocumentLoadError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, file);
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, file: string, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DocumentLoadError(`not a valid ${what}`, file, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Parse a document: `{ "content": ..., "styles": [...] }` or bare content
 */
export function parseDocument(text: string, file = '<input>'): LoadedDocument {
  const loaded = validate(documentSchema, parseJson(text, file), file, 'document');
  if (process.env.DEBUG_RULES) {
    console.error(`DEBUG_RULES: ${file}: document style entries: ${loaded.styles.length}`);
  }
  return loaded;
}

/**
 * Parse a stylesheet: an array of style rules or `{ "styles": [...] }`
 */
export function parseStylesheet(text: string, file = '<stylesheet>'): StyleEntry[] {
  const styles = validate(stylesheetSchema, parseJson(text, file), file, 'stylesheet');
  if (process.env.DEBUG_RULES) {
    console.error(`DEBUG_RULES: ${file}: style entries: ${styles.length}`);
  }
  return styles;
}

export function loadDocument(file: string): LoadedDocument {
  return parseDocument(fs.readFileSync(file, 'utf-8'), file);
}

export function loadStylesheet(file: string): StyleEntry[] {
  return parseStylesheet(fs.readFileSync(file, 'utf-8'), file);
}
