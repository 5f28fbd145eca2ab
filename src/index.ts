/**
 * hstack-engine
 *
 * Project discovery and command construction for the stack build tool.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from '#/core';

// Constants (marker files, channel naming)
export * from '#/constants';

// Errors
export * from '#/errors';

// Logging
export * from '#/logger';

// Config (schema, .hstack.yaml loading)
export * from '#/schemas';
export * from '#/friendly-errors';
export * from '#/config';

// Manifest (line classifier, package records)
export * from '#/manifest';

// Project (root search, manifest discovery, cached session)
export * from '#/project';

// Installed packages
export * from '#/registry';

// Version ordering
export * from '#/version';

// Targets
export * from '#/targets';

// Command building (quoting, operations, channels)
export * from '#/command';

// Process running and output scanning
export * from '#/runner';
export * from '#/output';

// Engine facade
export * from '#/engine';

// Node implementations of the core interfaces
export * from '#/node';
