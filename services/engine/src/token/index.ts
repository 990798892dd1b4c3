export * from "./fundraising-token.js";
