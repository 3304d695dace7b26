/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export debug logging
export * from './debug/index.js';

// Export utilities
export * from './utils/paths.js';
