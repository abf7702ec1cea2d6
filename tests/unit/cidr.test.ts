import {
    allocateSubnets,
    cidrContains,
    cidrSize,
    cidrsOverlap,
    cidrSubnet,
    formatCidr,
    intToIp,
    ipToInt,
    parseCidr
} from "../../components/shared/utils/cidr";
import { CidrError } from "../../components/shared/utils/error-handling";

describe('CIDR utilities', () => {
    describe('parseCidr', () => {
        it('should parse a network address and prefix', () => {
            expect(parseCidr('192.168.1.0/24')).toEqual({ address: 3232235776, prefixLength: 24 });
            expect(parseCidr('0.0.0.0/0')).toEqual({ address: 0, prefixLength: 0 });
        });

        it('should round-trip through formatCidr', () => {
            expect(formatCidr(parseCidr('172.31.240.0/20'))).toBe('172.31.240.0/20');
        });

        it('should reject malformed blocks', () => {
            expect(() => parseCidr('10.0.0/16')).toThrow('Invalid CIDR block format');
            expect(() => parseCidr('10.0.0.0')).toThrow(CidrError);
            expect(() => parseCidr('256.0.0.0/8')).toThrow('Invalid IPv4 address');
            expect(() => parseCidr('10.0.0.0/33')).toThrow('CIDR prefix length must be between 0 and 32');
        });

        it('should reject host bits below the prefix', () => {
            expect(() => parseCidr('10.0.0.1/16')).toThrow('Host bits are set, did you mean 10.0.0.0/16?');
        });

        it('should report errors with the cidr code', () => {
            let caught: unknown;
            try {
                parseCidr('10.0.0.1/16');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(CidrError);
            expect(caught).toMatchObject({ errorCode: 'CIDR_ERROR', cidr: '10.0.0.1/16' });
        });
    });

    describe('address conversion', () => {
        it('should convert between dotted quads and unsigned integers', () => {
            expect(ipToInt('255.255.255.255')).toBe(4294967295);
            expect(ipToInt('10.0.0.1')).toBe(167772161);
            expect(intToIp(4294967295)).toBe('255.255.255.255');
            expect(intToIp(167772161)).toBe('10.0.0.1');
        });
    });

    describe('cidrSubnet', () => {
        it('should carve subnets like cidrsubnet', () => {
            expect(cidrSubnet('10.0.0.0/16', 8, 0)).toBe('10.0.0.0/24');
            expect(cidrSubnet('10.0.0.0/16', 8, 5)).toBe('10.0.5.0/24');
            expect(cidrSubnet('10.0.0.0/16', 4, 3)).toBe('10.0.48.0/20');
            expect(cidrSubnet('172.16.0.0/12', 4, 15)).toBe('172.31.0.0/16');
        });

        it('should reject prefixes past /32', () => {
            expect(() => cidrSubnet('10.0.0.0/16', 17, 0)).toThrow('Cannot extend prefix by 17 bits');
        });

        it('should reject network numbers that do not fit', () => {
            expect(() => cidrSubnet('10.0.0.0/16', 2, 4)).toThrow('Network number 4 does not fit in 2 bits');
        });
    });

    describe('containment and overlap', () => {
        it('should detect containment', () => {
            expect(cidrContains('10.0.0.0/16', '10.0.255.0/24')).toBe(true);
            expect(cidrContains('10.0.0.0/16', '10.1.0.0/24')).toBe(false);
            expect(cidrContains('10.0.0.0/24', '10.0.0.0/16')).toBe(false);
        });

        it('should detect overlap', () => {
            expect(cidrsOverlap('10.0.0.0/16', '10.0.128.0/17')).toBe(true);
            expect(cidrsOverlap('10.0.0.0/24', '10.0.1.0/24')).toBe(false);
        });

        it('should size blocks', () => {
            expect(cidrSize('10.0.0.0/28')).toBe(16);
            expect(cidrSize('10.0.0.0/16')).toBe(65536);
        });
    });

    describe('allocateSubnets', () => {
        it('should allocate consecutive blocks', () => {
            expect(allocateSubnets('10.0.0.0/16', [{ prefixLength: 24 }, { prefixLength: 24 }]))
                .toEqual(['10.0.0.0/24', '10.0.1.0/24']);
        });

        it('should align mixed sizes without overlap', () => {
            expect(allocateSubnets('10.0.0.0/16', [{ prefixLength: 24 }, { prefixLength: 20 }, { prefixLength: 24 }]))
                .toEqual(['10.0.0.0/24', '10.0.16.0/20', '10.0.32.0/24']);
        });

        it('should skip reserved ranges', () => {
            expect(allocateSubnets('10.0.0.0/16', [{ prefixLength: 24 }, { prefixLength: 24 }], ['10.0.0.0/24', '10.0.2.0/24']))
                .toEqual(['10.0.1.0/24', '10.0.3.0/24']);
        });

        it('should fail when the range is exhausted', () => {
            expect(() => allocateSubnets('10.0.0.0/24', [{ prefixLength: 25 }, { prefixLength: 25 }, { prefixLength: 25 }]))
                .toThrow('Address space exhausted allocating a /25 subnet');
        });

        it('should reject subnets larger than the VPC', () => {
            expect(() => allocateSubnets('10.0.0.0/24', [{ prefixLength: 16 }]))
                .toThrow('Subnet prefix /16 does not fit in the VPC range');
        });
    });
});
