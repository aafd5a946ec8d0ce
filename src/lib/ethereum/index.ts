export { deriveAddress, deriveDepositId } from "./hash.js";
export { ether, formatWei } from "./units.js";
