export * from "./launch-guard.js";
