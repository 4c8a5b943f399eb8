/**
 * dotstrap
 *
 * Provisioning engine for a shared development prefix: platform detection,
 * toolchains, CLI tools built from source and per-user setup.
 * Every module takes its I/O through the injected EngineContext.
 */

// Core interfaces, Node adapters, logging, privileges
export * from "#/core";

// Schemas (Zod validation)
export * from "#/schemas";
export * from "#/friendly-errors";

// Host and prefix
export * from "#/platform";
export * from "#/layout";
export * from "#/settings";
export * from "#/tools-conf";

// Clients
export * from "#/package-manager";
export * from "#/git";
export * from "#/github";
export * from "#/download";
export * from "#/environment";

// Version utilities (tag selection, comparison)
export * from "#/version";

// Formatters (pure utilities)
export * from "#/formatters";

// Installers
export * from "#/toolchains";
export * from "#/tools";
export * from "#/user-setup";
export * from "#/orchestrator";
