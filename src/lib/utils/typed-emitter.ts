import { EventEmitter } from 'events';

type ListenerArgs<T> = T extends void ? [] : [T];
type TypedListener<T> = (...args: ListenerArgs<T>) => void;

/**
 * EventEmitter whose `on`/`once`/`off`/`emit` are checked against an event map.
 */
export class TypedEventEmitter<Events extends { [K in keyof Events]: unknown }> extends EventEmitter {
  declare on: (<K extends keyof Events>(event: K, listener: TypedListener<Events[K]>) => this) &
    EventEmitter['on'];
  declare once: (<K extends keyof Events>(event: K, listener: TypedListener<Events[K]>) => this) &
    EventEmitter['once'];
  declare off: (<K extends keyof Events>(event: K, listener: TypedListener<Events[K]>) => this) &
    EventEmitter['off'];
  declare emit: (<K extends keyof Events>(event: K, ...args: ListenerArgs<Events[K]>) => boolean) &
    EventEmitter['emit'];
}
