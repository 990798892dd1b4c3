export * from "./threshold-math.js";
