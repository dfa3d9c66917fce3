/**
 * ModuleLayout — module-addressed channels over the registry's flat index
 * space. Module m owns the contiguous range [offset(m), offset(m) + size(m)),
 * so a cross-module pair is an ordinary pair of registry channels and takes
 * both channel locks like any two-channel operation.
 */

import { InvalidChannelError, InvalidRequestError } from './errors';
import type { ChannelAddress } from './types';

export class ModuleLayout {
    private readonly sizes: readonly number[];
    private readonly offsets: readonly number[];
    /** Total channel count across modules */
    readonly size: number;

    constructor(moduleSizes: readonly number[]) {
        if (moduleSizes.length === 0) {
            throw new RangeError('A processor needs at least one module');
        }
        const offsets: number[] = [];
        let total = 0;
        moduleSizes.forEach((n, m) => {
            if (!Number.isInteger(n) || n < 1) {
                throw new RangeError(`Module ${m} size must be a positive integer, got ${n}`);
            }
            offsets.push(total);
            total += n;
        });
        this.sizes = Object.freeze([...moduleSizes]);
        this.offsets = Object.freeze(offsets);
        this.size = total;
    }

    get moduleCount(): number {
        return this.sizes.length;
    }

    moduleSizes(): number[] {
        return [...this.sizes];
    }

    assertModule(module: number): void {
        if (!Number.isInteger(module) || module < 0 || module >= this.sizes.length) {
            throw new InvalidRequestError(`Unknown module ${String(module)}: expected an integer in [0, ${this.sizes.length})`, { module });
        }
    }

    /** Registry index of a module-local channel. */
    toGlobal(address: ChannelAddress): number {
        this.assertModule(address.module);
        const size = this.sizes[address.module];
        if (!Number.isInteger(address.channel) || address.channel < 0 || address.channel >= size) {
            throw new InvalidChannelError(address.channel, size, address.module);
        }
        return this.offsets[address.module] + address.channel;
    }

    toAddress(channel: number): ChannelAddress {
        if (!Number.isInteger(channel) || channel < 0 || channel >= this.size) {
            throw new InvalidChannelError(channel, this.size);
        }
        let module = this.sizes.length - 1;
        while (this.offsets[module] > channel) module--;
        return { module, channel: channel - this.offsets[module] };
    }

    /** Registry indices of every channel on `module`, in order. */
    channelsOf(module: number): number[] {
        this.assertModule(module);
        const offset = this.offsets[module];
        return Array.from({ length: this.sizes[module] }, (_, i) => offset + i);
    }
}
