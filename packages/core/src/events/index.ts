export {
  BusEvent,
  EventBus,
  type EventBusOptions,
  type EventDetails,
  type EventHandler,
} from "./event-bus";
