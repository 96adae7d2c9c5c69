export { Dispatcher, type DispatcherOptions, type NotificationListener } from "./dispatcher";
