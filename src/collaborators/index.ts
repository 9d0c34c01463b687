export type { IFungibleAsset, INodeProperties, IRewardsOracle, IClock } from './interfaces';
export { SystemClock, ManualClock } from './clock';
export { InMemoryToken } from './inMemoryToken';
export type { TokenSnapshot } from './inMemoryToken';
export { InMemoryNodeProperties, MAX_NODE_QUALITY } from './inMemoryNodeProperties';
export type { NodePropertiesSnapshot } from './inMemoryNodeProperties';
