/**
 * Central export file for all shared types
 */

export * from './CaseRecord';
export * from './Commission';
export * from './Search';
