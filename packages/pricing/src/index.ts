// Black-Scholes option pricing on a calcgraph

export {
  BlackScholesNodes,
  registerBlackScholes,
  type ContractTerms,
  type MarketData,
  type OptionType,
} from "./black-scholes.js";
export { normalCdf } from "./normal.js";
