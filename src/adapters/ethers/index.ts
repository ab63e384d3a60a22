// index.ts
export { createEthersCodecDeps, fromEthersLog } from './codec';
export { makeCallTransportFromEthers } from '../../core/rpc/transport';
