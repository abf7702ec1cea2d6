import { CidrError } from "./error-handling";

/**
 * IPv4 CIDR arithmetic used to carve subnets out of a VPC range.
 * Addresses are held as unsigned 32-bit integers.
 */

export interface CidrBlock {
    /** Network address as an unsigned 32-bit integer */
    address: number;
    prefixLength: number;
}

export interface SubnetRequest {
    prefixLength: number;
}

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

export function ipToInt(ip: string): number {
    const octets = ip.split('.');
    if (octets.length !== 4 || octets.some(octet => !/^\d{1,3}$/.test(octet) || parseInt(octet, 10) > 255)) {
        throw new CidrError(ip, 'Invalid IPv4 address');
    }
    return octets.reduce((acc, octet) => ((acc << 8) | parseInt(octet, 10)) >>> 0, 0);
}

export function intToIp(value: number): string {
    return [
        (value >>> 24) & 0xFF,
        (value >>> 16) & 0xFF,
        (value >>> 8) & 0xFF,
        value & 0xFF
    ].join('.');
}

/** Number of addresses in a block of the given prefix length */
export function blockSize(prefixLength: number): number {
    return Math.pow(2, 32 - prefixLength);
}

function maskOf(prefixLength: number): number {
    return prefixLength === 0 ? 0 : (0xFFFFFFFF << (32 - prefixLength)) >>> 0;
}

/**
 * Parse a CIDR string. Host bits below the prefix must be zero.
 */
export function parseCidr(cidr: string): CidrBlock {
    const match = CIDR_PATTERN.exec(cidr);
    if (!match) {
        throw new CidrError(cidr, 'Invalid CIDR block format, expected a.b.c.d/n');
    }

    const prefixLength = parseInt(match[5], 10);
    if (prefixLength > 32) {
        throw new CidrError(cidr, 'CIDR prefix length must be between 0 and 32', { prefixLength });
    }

    const address = ipToInt(`${match[1]}.${match[2]}.${match[3]}.${match[4]}`);
    if ((address & ~maskOf(prefixLength)) !== 0) {
        throw new CidrError(cidr, `Host bits are set, did you mean ${intToIp((address & maskOf(prefixLength)) >>> 0)}/${prefixLength}?`);
    }

    return { address, prefixLength };
}

export function formatCidr(block: CidrBlock): string {
    return `${intToIp(block.address)}/${block.prefixLength}`;
}

export function cidrSize(cidr: string): number {
    return blockSize(parseCidr(cidr).prefixLength);
}

/**
 * Calculate a subnet address within the given prefix, like Terraform's cidrsubnet
 * @param newBits bits added to the prefix
 * @param netNum index of the subnet among the 2^newBits candidates
 */
export function cidrSubnet(cidr: string, newBits: number, netNum: number): string {
    const base = parseCidr(cidr);
    const prefixLength = base.prefixLength + newBits;

    if (!Number.isInteger(newBits) || newBits < 0 || prefixLength > 32) {
        throw new CidrError(cidr, `Cannot extend prefix by ${newBits} bits`, { newBits });
    }
    if (!Number.isInteger(netNum) || netNum < 0 || netNum >= Math.pow(2, newBits)) {
        throw new CidrError(cidr, `Network number ${netNum} does not fit in ${newBits} bits`, { newBits, netNum });
    }

    return formatCidr({
        address: base.address + netNum * blockSize(prefixLength),
        prefixLength
    });
}

function lastAddress(block: CidrBlock): number {
    return block.address + blockSize(block.prefixLength) - 1;
}

export function cidrContains(outer: string, inner: string): boolean {
    const o = parseCidr(outer);
    const i = parseCidr(inner);
    return i.prefixLength >= o.prefixLength
        && i.address >= o.address
        && lastAddress(i) <= lastAddress(o);
}

export function cidrsOverlap(a: string, b: string): boolean {
    return blocksOverlap(parseCidr(a), parseCidr(b));
}

function blocksOverlap(a: CidrBlock, b: CidrBlock): boolean {
    return a.address <= lastAddress(b) && b.address <= lastAddress(a);
}

/**
 * Allocate subnets from a VPC range in request order.
 * Each request takes the lowest block at or after the previous allocation
 * that is aligned to its size and clear of every reserved range.
 */
export function allocateSubnets(
    vpcCidr: string,
    requests: readonly SubnetRequest[],
    reserved: readonly string[] = []
): string[] {
    const vpc = parseCidr(vpcCidr);
    const vpcEnd = lastAddress(vpc) + 1;
    const taken = reserved.map(parseCidr);
    const allocated: string[] = [];
    let cursor = vpc.address;

    for (const request of requests) {
        if (request.prefixLength < vpc.prefixLength || request.prefixLength > 32) {
            throw new CidrError(vpcCidr, `Subnet prefix /${request.prefixLength} does not fit in the VPC range`, {
                prefixLength: request.prefixLength
            });
        }

        const size = blockSize(request.prefixLength);
        let candidate = Math.ceil(cursor / size) * size;
        let placed: CidrBlock | undefined;

        while (candidate + size <= vpcEnd) {
            const block = { address: candidate, prefixLength: request.prefixLength };
            const clash = taken.find(range => blocksOverlap(range, block));
            if (!clash) {
                placed = block;
                break;
            }
            // Jump past the clashing range, then realign
            candidate = Math.ceil((lastAddress(clash) + 1) / size) * size;
        }

        if (!placed) {
            throw new CidrError(vpcCidr, `Address space exhausted allocating a /${request.prefixLength} subnet`, {
                allocated: allocated.length,
                requested: requests.length
            });
        }

        taken.push(placed);
        allocated.push(formatCidr(placed));
        cursor = lastAddress(placed) + 1;
    }

    return allocated;
}
