// index.ts
export { createViemCodecDeps, fromViemLog } from './codec';
export { makeCallTransportFromViem } from '../../core/rpc/transport';
