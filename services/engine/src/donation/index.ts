export * from "./donation-forwarder.js";
