import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { MissingFieldError } from '../core/errors';
import { err, ok, type Result } from '../core/result';
import {
  type FieldMap,
  type FieldRule,
  type FieldRules,
  type PageSnapshot,
  RECORD_FIELDS,
  type RecordField,
} from '../core/types';

// ================================================
// EXTRACTOR TYPES
// ================================================

export interface ExtractOptions {
  /** Container that scopes every `rendered` lookup */
  scope?: string;
}

// Collapses runs of whitespace left over from nested inline markup
const WHITESPACE_PATTERN = /\s+/g;

function cleanText(text: string | undefined): string {
  return (text ?? '').replace(WHITESPACE_PATTERN, ' ').trim();
}

/**
 * Parses each markup source at most once per snapshot
 */
class SnapshotDocuments {
  private rendered: CheerioAPI | null = null;
  private document: CheerioAPI | null = null;

  constructor(private readonly snapshot: PageSnapshot) {}

  get(source: 'rendered' | 'document'): CheerioAPI {
    if (source === 'rendered') {
      this.rendered ??= cheerio.load(this.snapshot.renderedHtml);
      return this.rendered;
    }
    this.document ??= cheerio.load(this.snapshot.documentHtml);
    return this.document;
  }
}

function lookup(
  $: CheerioAPI,
  rule: FieldRule,
  scope: string | undefined
): string {
  const root = scope ? $(scope).first() : null;
  if (root && root.length === 0) {
    return '';
  }

  for (const selector of rule.selectors ?? []) {
    const node = (root ? root.find(selector) : $(selector)).first();
    if (node.length === 0) {
      continue;
    }

    const value = rule.attribute
      ? cleanText(node.attr(rule.attribute))
      : cleanText(node.text());
    if (value) {
      return value;
    }
  }

  return '';
}

function readField(
  documents: SnapshotDocuments,
  snapshot: PageSnapshot,
  rule: FieldRule,
  options: ExtractOptions
): string {
  if (rule.source === 'location') {
    return snapshot.url.trim();
  }

  const scope = rule.source === 'rendered' ? options.scope : undefined;
  return lookup(documents.get(rule.source), rule, scope);
}

// ================================================
// FIELD EXTRACTION
// ================================================

/**
 * Look up every record field in the snapshot. The first required field
 * without a value fails the extraction; optional fields default to ''.
 */
export function extractFields(
  snapshot: PageSnapshot,
  rules: FieldRules,
  options: ExtractOptions = {}
): Result<FieldMap, MissingFieldError> {
  const documents = new SnapshotDocuments(snapshot);
  const values = new Map<RecordField, string>();

  for (const field of RECORD_FIELDS) {
    const rule = rules[field];
    const value = readField(documents, snapshot, rule, options);

    if (!value && rule.required) {
      return err(new MissingFieldError(field));
    }
    values.set(field, value);
  }

  const get = (field: RecordField) => values.get(field) ?? '';
  return ok({
    currentURL: get('currentURL'),
    thumbnailURL: get('thumbnailURL'),
    userName: get('userName'),
    likeCount: get('likeCount'),
    commentCount: get('commentCount'),
    title: get('title'),
    description: get('description'),
    publishedAt: get('publishedAt'),
    viewCount: get('viewCount'),
  });
}

// ================================================
// LISTING LINKS
// ================================================

/**
 * Absolute item URLs found on a listing page, without query string or
 * fragment, in page order and without duplicates.
 */
export function extractItemLinks(
  html: string,
  baseUrl: string,
  selector: string
): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $(selector).each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href || !URL.canParse(href, baseUrl)) {
      return;
    }

    const url = new URL(href, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return;
    }
    url.search = '';
    url.hash = '';
    links.add(url.toString());
  });

  return [...links];
}
