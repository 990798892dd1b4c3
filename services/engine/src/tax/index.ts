export * from "./tax-router.js";
