// =============================================================================
// zipsink - Package Exports
// =============================================================================

// Core shared exports (from core module)
export * from './core';
import ZipWriter from './core';
export default ZipWriter;

// Node.js file output
export { FileSink, createZipFile } from './node';
