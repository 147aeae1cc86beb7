export { tokenizeLine, tokenizeScript, joinSpans } from './tokenizer.js';
export { highlightScript, renderSpan, stripAnsi } from './render.js';
export {
  listHighlightSchemes,
  getHighlightSchemeCount,
  getHighlightSchemeName,
  parseHighlightScheme,
} from './schemes.js';
