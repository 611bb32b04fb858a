/**
 * Browser Planning
 *
 * Subject list, filter and viewer pane behaviour shared by Loading,
 * Browsing, Viewing and Searching. Also builds the schema context when a
 * fetched schema is accepted.
 */

import { compileSchema, prettyPrintSchema } from '@avrodeck/avro';
import { subjectToTopic } from '../topic.js';
import type { BrowserState, RegistrySchema, SchemaContext, Session } from '../types.js';
import { clamp } from './shared.js';

export function emptyBrowser(): BrowserState {
  return {
    subjects: [],
    filtered: [],
    filter: '',
    selectedIndex: 0,
    focusedPane: 'list',
    requestedSubject: null,
    viewerScroll: 0,
  };
}

/**
 * Case-insensitive substring match; an empty filter keeps every subject.
 */
export function filterSubjects(subjects: string[], filter: string): string[] {
  const query = filter.toLowerCase();
  if (query === '') return subjects;
  return subjects.filter((subject) => subject.toLowerCase().includes(query));
}

export function selectedSubject(browser: BrowserState): string | undefined {
  return browser.filtered[browser.selectedIndex];
}

/**
 * Re-apply the filter, keeping the selected subject selected when it
 * survives and falling back to the first entry otherwise.
 */
export function applyFilter(browser: BrowserState, filter: string): BrowserState {
  const previous = selectedSubject(browser);
  const filtered = filterSubjects(browser.subjects, filter);
  const kept = previous === undefined ? -1 : filtered.indexOf(previous);
  return { ...browser, filter, filtered, selectedIndex: Math.max(kept, 0) };
}

export function moveSelection(browser: BrowserState, delta: number): BrowserState {
  if (browser.filtered.length === 0) return browser;
  const selectedIndex = clamp(browser.selectedIndex + delta, 0, browser.filtered.length - 1);
  return selectedIndex === browser.selectedIndex ? browser : { ...browser, selectedIndex };
}

export function scrollViewer(browser: BrowserState, delta: number, lineCount: number): BrowserState {
  const viewerScroll = clamp(browser.viewerScroll + delta, 0, Math.max(lineCount - 1, 0));
  return viewerScroll === browser.viewerScroll ? browser : { ...browser, viewerScroll };
}

export function updateBrowser(session: Session, update: (browser: BrowserState) => BrowserState): Session {
  const browser = update(session.browser);
  return browser === session.browser ? session : { ...session, browser };
}

/**
 * Build the context for a fetched schema. Throws SchemaDefinitionError when
 * the schema text is not JSON.
 */
export function createContext(schema: RegistrySchema): SchemaContext {
  return {
    subject: schema.subject,
    version: schema.version,
    schemaId: schema.id,
    schemaText: schema.schemaText,
    prettySchema: prettyPrintSchema(schema.schemaText),
    compiled: compileSchema(schema.schemaText),
    topic: subjectToTopic(schema.subject),
  };
}

export function lineCount(text: string): number {
  return text.split('\n').length;
}
