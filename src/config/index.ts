/**
 * Configuration Module Entry Point
 * Centralized configuration management for the OpenProject bulk MCP server
 */

export * from './types';
export * from './ConfigurationManager';
