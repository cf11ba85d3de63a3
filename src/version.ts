export const VERSION = process.env.npm_package_version || "0.3.0";
