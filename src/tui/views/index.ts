export { BaseView } from './base-view.js';
export { TextView, toDisplayLine, type TextViewOptions } from './text-view.js';
export { CompletionView, type CompletionViewOptions } from './completion-view.js';
export { FileBrowserView, type FileBrowserViewOptions } from './file-browser-view.js';
export { BufferListView } from './buffer-list-view.js';
