export { generateId } from './id.js';
