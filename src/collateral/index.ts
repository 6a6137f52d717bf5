export { CollateralPool } from "./collateral-pool.js";
export type { CollateralPoolOptions, PoolSnapshot } from "./collateral-pool.js";
