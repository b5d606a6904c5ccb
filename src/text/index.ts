export { TextRange, type TextSize } from './text_range.js';
