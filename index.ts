/**
 * envoy-service-compiler
 *
 * Main entry point. Exports the export engine, its adapters, the data-plane
 * rule engine and the shared types.
 */
export * from './src'
