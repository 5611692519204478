#!/usr/bin/env tsx
/**
 * Upload a directory of images to Imgur as a single ordered album
 *
 * Usage:
 *   npm run upload -- <directory> <album-title> [--public]
 *   npm run upload -- ./scans "Chapter 12"
 */

import * as dotenv from 'dotenv';
import { main } from '../src/cli';

dotenv.config();

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('❌ Fatal error:', error);
    process.exitCode = 1;
  });
