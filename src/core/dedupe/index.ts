// src/core/dedupe/index.ts
export { ProcessedUrlStore } from './store.js';
export { LiveScanner } from './live-scan.js';
export type { ForumScanLimits } from './live-scan.js';
export { DuplicateDetector } from './detector.js';
export type { DuplicateDetectorOptions, LiveCheck } from './detector.js';
