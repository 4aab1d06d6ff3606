/**
 * @format
 * Aspects - Central Export
 */

export * from './cdk-nag-aspect';
export * from './tagging-aspect';
