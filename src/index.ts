/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * as Dimension from "./Dimension.js"
export type { Dimensions } from "./Dimension.js"
export * as Quantity from "./Quantity.js"
export * from "./SymbolTable.js"
export * from "./Parsing.js"
export * as SI from "./SI.js"
export * from "./UnitSystem.js"
