import createDebug from "debug";

const debug = createDebug("HAPServer:Events");

export enum HAPEventTypes {
    CONTROLLER_PAIRED = "controller-paired",
    CONTROLLER_UNPAIRED = "controller-unpaired",
}

export type HAPEvent =
    | { type: HAPEventTypes.CONTROLLER_PAIRED, id: string }
    | { type: HAPEventTypes.CONTROLLER_UNPAIRED, id: string };

export type HAPEventListener = (event: HAPEvent) => void | Promise<void>;

export interface EventSink {
    emit(event: HAPEvent): Promise<void>;
}

/**
 * Delivers pairing lifecycle events to every registered listener, one after another.
 * {@link emit} resolves once all listeners completed. A failing listener is logged and doesn't affect the others.
 */
export class EventDispatcher implements EventSink {

    private readonly listeners: HAPEventListener[] = [];

    addListener(listener: HAPEventListener): void {
        this.listeners.push(listener);
    }

    removeListener(listener: HAPEventListener): void {
        const index = this.listeners.indexOf(listener);
        if (index >= 0) {
            this.listeners.splice(index, 1);
        }
    }

    async emit(event: HAPEvent): Promise<void> {
        debug("Emitting %s for %s to %d listeners", event.type, event.id, this.listeners.length);

        for (const listener of this.listeners.slice()) {
            try {
                await listener(event);
            } catch (error) {
                debug("Listener for %s failed: %s", event.type, error);
            }
        }
    }

}
