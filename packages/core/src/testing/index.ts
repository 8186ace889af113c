/**
 * Test helpers shared across workspaces
 */

export { FakeBridge, type FakeLinkState } from './fakeBridge.js';
