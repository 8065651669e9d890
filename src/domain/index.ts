/**
 * Domain model exports.
 */

export * from './attachments';
export * from './errors';
export * from './status';
export * from './workflow';
