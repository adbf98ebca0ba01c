export * from "./product.js";
export * from "./sales.js";
