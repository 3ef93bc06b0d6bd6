/**
 * @tablekit/events
 *
 * In-process event dispatcher.
 */

export { EventDispatcher, type EventHandler, type EventPayload, type ListenerOptions } from './dispatcher.js';
