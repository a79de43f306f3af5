/**
 * intune-bulk-assign - bulk application-to-group assignment engine for Microsoft Intune
 */

export * from './types';
export * from './core';
export * from './utils/constants';
export * from './utils/errors';
export * from './utils/logger';
