/**
 * @file Route handler context shared across modules
 */
import type { ServerConfig } from "../types";

export type RouteContext = Pick<ServerConfig, "root" | "listDirectories" | "indexFiles">;
