#!/usr/bin/env node

/**
 * Create ZIP Example
 *
 * Writes the files named on the command line into a ZIP archive.
 *
 *   npm run example:create -- output.zip file1.txt file2.txt
 */

import { createZipFile, isCompressionLevel } from '../src/node';
import type { CompressionLevel } from '../src/core';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Helper function to format bytes
 */
function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));
  return (bytes / Math.pow(k, i)).toFixed(1) + ' ' + sizes[i];
}

function padRight(str: string, length: number): string {
  return (str + ' '.repeat(length)).slice(0, length);
}

function main(): void {
  const [outputZip, ...inputFiles] = process.argv.slice(2);
  if (!outputZip || inputFiles.length === 0) {
    console.error('Usage: create-zip <output.zip> <file>...');
    process.exit(1);
  }

  const envLevel = process.env.ZIP_LEVEL ?? 'default';
  const level: CompressionLevel = isCompressionLevel(envLevel) ? envLevel : 'default';

  for (const file of inputFiles) {
    if (!fs.existsSync(file)) {
      console.error(`❌ Error: file not found: ${file}`);
      process.exit(1);
    }
  }

  const entries = createZipFile(outputZip, zip => {
    for (const file of inputFiles) {
      const stats = fs.statSync(file);
      zip.addEntry(path.basename(file), fs.readFileSync(file), level, { mtime: stats.mtime });
    }
    return zip.entries;
  });

  console.log(`Created ${outputZip} (${formatBytes(fs.statSync(outputZip).size)}, level=${level})\n`);
  for (const entry of entries) {
    console.log(
      `  ${padRight(entry.name, 32)} ${padRight(formatBytes(entry.uncompressedSize), 10)} -> ` +
      `${padRight(formatBytes(entry.compressedSize), 10)} ${entry.toFormattedDateString()}`
    );
  }
}

main();
