export { classifyLine, type ProgressLine } from './line-classifier.js';
export { parseProgress, parseProgressText, splitLines } from './progress-parser.js';
