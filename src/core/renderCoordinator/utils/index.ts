/**
 * Utility functions for the RenderCoordinator.
 * Pure, stateless helper functions organized by category.
 *
 * @module utils
 */

// Value utilities
export * from './dataPointUtils';

// Bounds computation
export * from './boundsComputation';

// Sizing and allocation
export * from './layoutUtils';
