/**
 * Loader Module
 * Converts source text into a validated program
 */

export { load, tryLoad } from './loader.js';
export { createLoaderState, type LoaderState } from './state.js';
