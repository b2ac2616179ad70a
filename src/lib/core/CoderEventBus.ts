/**
 * Event bus for coder diagnostics.
 * Components publish warnings, skips and coded events here; listeners
 * (log sinks, validation harnesses, UIs) subscribe without the coder
 * knowing about them.
 */

import type { CodingFailure } from './errors';
import type { CodedEvent } from '@/lib/coding/types';

export interface DictionaryWarning {
    dictionary: 'verb' | 'actor' | 'agent' | 'discard' | 'issue';
    line: number;
    message: string;
}

export interface CoderEventMap {
    'dictionary-warning': DictionaryWarning;
    'sentence-skipped': CodingFailure;
    'sentence-discarded': { sentenceId: string; phrase: string };
    'story-discarded': { storyId: string; sentenceId: string; phrase: string };
    'story-skipped': { storyId: string; message: string };
    'events-coded': { sentenceId: string; events: CodedEvent[] };
}

export type CoderEventName = keyof CoderEventMap;

type Handler<K extends CoderEventName> = (payload: CoderEventMap[K]) => void;

type ListenerMap = { [K in CoderEventName]?: Set<Handler<K>> };

export class CoderEventBus {
    private listeners: ListenerMap = {};

    on<K extends CoderEventName>(event: K, handler: Handler<K>): () => void {
        const handlers: Set<Handler<K>> = this.listeners[event] ?? new Set<Handler<K>>();
        this.listeners[event] = handlers;
        handlers.add(handler);

        return () => {
            handlers.delete(handler);
        };
    }

    emit<K extends CoderEventName>(event: K, payload: CoderEventMap[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        handlers.forEach(handler => {
            try {
                handler(payload);
            } catch (error) {
                console.error(`[CoderEventBus] Error in ${event} handler:`, error);
            }
        });
    }

    clear(): void {
        this.listeners = {};
    }
}

// Shared by coders built without an explicit bus
export const coderEventBus = new CoderEventBus();
