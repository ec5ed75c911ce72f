/**
 * @fileoverview Testing utilities for Broadside packages.
 */

export { createMockHandle, flushMicrotasks, type MockHandle } from './mockHandle.js';
