/**
 * Core Constants
 *
 * Named constants shared across the automaton core modules.
 */

// =============================================================================
// HASH CONSTANTS
// =============================================================================

/** FNV-1a 32-bit offset basis */
export const FNV32_OFFSET_BASIS = 2166136261;

/** FNV-1a 32-bit prime */
export const FNV32_PRIME = 16777619;

