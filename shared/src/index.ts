/**
 * SEND Attribute Resolution - Shared Types
 */

export * from './types/sendAttribute.js';
