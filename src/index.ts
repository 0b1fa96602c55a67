/**
 * Market Discovery
 * Main entry point
 */

export const APP_NAME = "Market Discovery";
export const VERSION = "1.0.0";

export * from "./api/gamma";
export * from "./search";
export * from "./lib/errors";
