/**
 * Minimal human-readable ABIs for the contracts the miner touches.
 *
 * Only the functions and events the miner calls or decodes are listed.
 */

export const FACTORY_ABI: string[] = [
  'function wnFromGas(uint256 gas) view returns (uint256)',
  'function nonceOf(address account) view returns (uint256)',
  'function totalGasConsumed() view returns (uint256)',
  'function gasPrice() view returns (uint256)',
  'function isLighthouse(address lighthouse) view returns (bool)',
  'function createLighthouse(uint256 minimalStake, uint256 timeoutInBlocks, string name) returns (address)',
  'event NewLiability(address indexed liability)',
  'event NewLighthouse(address indexed lighthouse, string name)',
];

export const LIGHTHOUSE_ABI: string[] = [
  'function refill(uint256 value) returns (bool)',
  'function withdraw(uint256 value) returns (bool)',
  'function createLiability(bytes demand, bytes offer) returns (bool)',
  'function finalizeLiability(address liability, bytes result, bool success, bytes signature) returns (bool)',
  'function minimalStake() view returns (uint256)',
  'function providers(uint256 index) view returns (address)',
  'function stakes(address provider) view returns (uint256)',
  'function indexOf(address provider) view returns (uint256)',
  'function marker() view returns (uint256)',
  'function quota() view returns (uint256)',
  'function keepAliveBlock() view returns (uint256)',
  'function timeoutInBlocks() view returns (uint256)',
];

export const ERC20_ABI: string[] = [
  'function balanceOf(address owner) view returns (uint256)',
  'function approve(address spender, uint256 value) returns (bool)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'event Transfer(address indexed from, address indexed to, uint256 value)',
];

export const UNISWAP_V2_ROUTER_ABI: string[] = [
  'function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)',
  'function getAmountsIn(uint256 amountOut, address[] path) view returns (uint256[] amounts)',
  'function swapExactETHForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)',
  'function swapExactTokensForETH(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)',
];

export const AUCTION_ABI: string[] = [
  'function finalPrice() view returns (uint256)',
];

export const CHAINLINK_ABI: string[] = [
  'function latestAnswer() view returns (int256)',
  'function decimals() view returns (uint8)',
];
