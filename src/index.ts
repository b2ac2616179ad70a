/**
 * Treebank event coder - public surface
 */

import { resolveCoderConfig, type CoderConfigInput } from '@/lib/config/coderConfig';
import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { StoryCoder } from '@/lib/coding/StoryCoder';
import { loadDictionaries } from '@/lib/dictionaries/DictionaryLoader';

export * from '@/lib/core';
export * from '@/lib/config/coderConfig';
export * from '@/lib/dictionaries';
export * from '@/lib/treebank';
export * from '@/lib/coding';
export * from '@/lib/validation';

/** Validate the config, load its dictionaries and return a ready coder */
export function createStoryCoder(input: CoderConfigInput = {}, bus: CoderEventBus = coderEventBus): StoryCoder {
    const config = resolveCoderConfig(input);
    return new StoryCoder(loadDictionaries(config, bus), config, bus);
}
