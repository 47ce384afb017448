/**
 * Host validation
 */

import { z } from 'zod';

const ADDRESS_PATTERN = /^(\d{1,3}(?:\.\d{1,3}){3})(?::(\d{1,5})|\/(\d{1,2}))?$/;

/**
 * Accepts an IPv4 address, optionally followed by `:port` (1-65535) or a
 * `/prefix` (0-32).
 */
export function isValidAddress(address: string): boolean {
    const match = ADDRESS_PATTERN.exec(address);

    if (!match) {
        return false;
    }

    const [ , ip, port, prefix ] = match;

    if (ip.split('.').some(octet => Number(octet) > 255)) {
        return false;
    }
    if (port !== undefined && (Number(port) < 1 || Number(port) > 65535)) {
        return false;
    }

    return prefix === undefined || Number(prefix) <= 32;
}

const AddressSchema = z.string().trim().refine(isValidAddress, address => ({
    message: `Invalid address: ${address}`
}));

export const HostSchema = z.object({
    media: z.array(AddressSchema).default([]),
    name: z.string().trim().min(1),
    sip: z.array(AddressSchema).default([])
});

export const HostListSchema = z.array(HostSchema).superRefine((hosts, ctx) => {
    const seen = new Set<string>();

    hosts.forEach((host, index) => {
        if (seen.has(host.name)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Duplicate host name: ${host.name}`,
                path: [ index, 'name' ]
            });
        }
        seen.add(host.name);
    });
});
