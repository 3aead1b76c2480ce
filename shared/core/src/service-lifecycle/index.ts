/**
 * Service Lifecycle Module
 *
 * Shutdown handling and entry point helpers.
 *
 * @module service-lifecycle
 */

export * from './service-bootstrap';
