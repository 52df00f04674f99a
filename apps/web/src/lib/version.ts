/**
 * Version constants, read from package.json at build time.
 *
 * @module version
 */

import packageJson from "../../package.json";

export const APP_VERSION = packageJson.version;

export const SERVICE_NAME = "trendlens-web";
