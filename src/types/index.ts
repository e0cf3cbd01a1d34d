/**
 * Shared type foundations.
 */

export * from "./file.js";
