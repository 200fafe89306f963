export type { Serializer } from './Serializer';
export { JsonSerializer } from './JsonSerializer';
export { MsgpackSerializer } from './MsgpackSerializer';
