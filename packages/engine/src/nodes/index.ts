export { ConstantNode } from "./constant.js";
export { VariableNode, isVariableNode } from "./variable.js";
export { CalculatedNode, type CalculationBody } from "./calculated.js";
