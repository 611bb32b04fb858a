/**
 * Search Planning
 *
 * The filter is edited live; Enter keeps it, Esc clears it. Either way the
 * mode that opened the search resumes.
 */

import type { Key, SearchingMode, Session, Transition } from '../types.js';
import { applyFilter, moveSelection, updateBrowser } from './browser.js';
import { matches, stay, toMode, typedText } from './shared.js';

export function handleSearchKey(session: Session, mode: SearchingMode, key: Key): Transition {
  if (matches(key, 'escape')) {
    return toMode(
      updateBrowser(session, (browser) => applyFilter(browser, '')),
      mode.resume,
    );
  }
  if (matches(key, 'enter')) {
    return toMode(session, mode.resume);
  }

  // Arrow keys only: j and k are filter text here
  if (key.name === 'up' && key.text === undefined) {
    return stay(updateBrowser(session, (browser) => moveSelection(browser, -1)));
  }
  if (key.name === 'down' && key.text === undefined) {
    return stay(updateBrowser(session, (browser) => moveSelection(browser, 1)));
  }

  if (key.name === 'backspace' && !key.ctrl) {
    const { filter } = session.browser;
    if (filter === '') return stay(session);
    return stay(updateBrowser(session, (browser) => applyFilter(browser, filter.slice(0, -1))));
  }

  const text = typedText(key);
  if (text === undefined) return stay(session);
  return stay(updateBrowser(session, (browser) => applyFilter(browser, browser.filter + text)));
}
