export { readInputText, readInputFiles, readStream } from './read-input.js';
