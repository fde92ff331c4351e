/**
 * Download System - Main Entry Point
 * Routing, admission control, dispatch and the per-source handlers
 */

// Core components
export * from './core';

// Handlers
export * from './handlers';
