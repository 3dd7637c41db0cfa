/**
 * Parser Module
 * Builds executable programs from source text
 */

export { assemble, parse } from './assemble.js';
