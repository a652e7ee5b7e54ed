export type { WeftFlow } from "./types"
export { Flow, flow, isFlow, flowSymbol } from "./flow"
export {
  flowOf,
  emptyFlow,
  asFlow,
  range,
  generate,
  repeat,
  interval,
  channelFlow,
  fromSuspending,
  merge,
} from "./builders"
export { createSharedFlow } from "./shared-flow"
export { createStateFlow } from "./state-flow"
export { Channel } from "./channel"
export { structuralEquals } from "./equality"
export {
  NoSuchElementError,
  MoreThanOneElementError,
  ConcurrentEmitError,
  ChannelClosedError,
} from "./errors"

export const VERSION = "0.1.0"
