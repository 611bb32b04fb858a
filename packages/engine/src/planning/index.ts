export { emptyBrowser, filterSubjects, selectedSubject } from './browser.js';
export { handleBrowseKey, handleSchemaLoaded, handleSubjectsLoaded, requestSchema } from './browse.js';
export { enterConsuming, handleConsumerOpened, handleConsumingKey, handleMessagesFetched } from './consume.js';
export {
  handleDraftLoaded,
  handleDraftSaved,
  handleDraftsListed,
  handleLoadDraftKey,
  handleSaveDraftKey,
} from './drafts.js';
export { handleSearchKey } from './search.js';
export { enterSendDraft, handleEditorClosed, handlePublished, handleSendDraftKey } from './send.js';
export { KEYS, keyId, matches } from './shared.js';
