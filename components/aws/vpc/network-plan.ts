import { NatGatewayStrategy, SubnetTierSpec, SubnetType } from "../../shared/interfaces";
import { allocateSubnets, cidrContains, cidrsOverlap, parseCidr } from "../../shared/utils/cidr";
import { CidrError, ComponentError, ValidationError, ValidationUtils } from "../../shared/utils/error-handling";

/** AWS bounds on VPC and subnet prefix lengths */
export const MIN_PREFIX_LENGTH = 16;
export const MAX_PREFIX_LENGTH = 28;
export const DEFAULT_SUBNET_PREFIX = 24;
export const DEFAULT_AVAILABILITY_ZONE_COUNT = 2;
export const MAX_AVAILABILITY_ZONE_COUNT = 6;

export interface NetworkPlanInput {
    /** Component name, used in error messages */
    name: string;
    cidrBlock: string;
    availabilityZones?: string[];
    availabilityZoneCount?: number;
    publicSubnets?: SubnetTierSpec;
    privateSubnets?: SubnetTierSpec;
    internetGatewayEnabled?: boolean;
    natGatewayEnabled?: boolean;
    natGatewayStrategy?: NatGatewayStrategy;
}

export interface PlannedSubnet {
    type: SubnetType;
    /** Position within its tier */
    index: number;
    azIndex: number;
    cidrBlock: string;
    /** Key into NetworkPlan.routeTables */
    routeTableKey: string;
}

export interface PlannedNatGateway {
    /** Zone served; for a single NAT, the zone it sits in */
    azIndex: number;
    /** Index of the hosting subnet within the public tier */
    publicSubnetIndex: number;
}

export interface PlannedRouteTable {
    key: string;
    type: SubnetType;
    /** Set on per-zone private tables */
    azIndex?: number;
    defaultRoute?: { target: 'internet-gateway' } | { target: 'nat-gateway'; natIndex: number };
}

export interface NetworkPlan {
    zoneCount: number;
    subnets: PlannedSubnet[];
    internetGateway: boolean;
    natGateways: PlannedNatGateway[];
    natGatewayStrategy?: NatGatewayStrategy;
    routeTables: PlannedRouteTable[];
}

const COMPONENT_TYPE = "VPCComponent";

/**
 * Work out the full topology of a VPC: zones, subnet ranges, gateways,
 * route tables and which table each subnet joins.
 * Throws ValidationError or CidrError for inconsistent input.
 */
export function planNetwork(input: NetworkPlanInput): NetworkPlan {
    const name = input.name;
    const zoneCount = resolveZoneCount(input);

    const vpc = wrapCidr(name, () => parseCidr(input.cidrBlock));
    ValidationUtils.validateRange(vpc.prefixLength, "cidrBlock prefix", MIN_PREFIX_LENGTH, MAX_PREFIX_LENGTH, COMPONENT_TYPE, name);

    if (!input.publicSubnets && !input.privateSubnets) {
        throw new ValidationError(COMPONENT_TYPE, name, "subnets", undefined, "at least one of publicSubnets or privateSubnets");
    }

    const cidrs = resolveSubnetCidrs(name, input.cidrBlock, zoneCount, input.publicSubnets, input.privateSubnets);

    const hasPublic = cidrs.public.length > 0;
    const hasPrivate = cidrs.private.length > 0;
    const internetGateway = input.internetGatewayEnabled ?? hasPublic;
    const publicAz = cidrs.public.map((_, i) => i % zoneCount);
    const privateAz = cidrs.private.map((_, i) => i % zoneCount);

    // NAT gateways
    const natGateways: PlannedNatGateway[] = [];
    const strategy = input.natGatewayEnabled ? (input.natGatewayStrategy ?? 'zonal') : undefined;
    if (strategy) {
        if (!hasPublic) {
            throw new ComponentError(COMPONENT_TYPE, name, "Cannot create NAT Gateways without public subnets", "VALIDATION_ERROR");
        }
        if (!internetGateway) {
            throw new ComponentError(COMPONENT_TYPE, name, "Cannot create NAT Gateways without an Internet Gateway", "VALIDATION_ERROR");
        }

        if (strategy === 'single') {
            natGateways.push({ azIndex: publicAz[0], publicSubnetIndex: 0 });
        } else {
            for (let az = 0; az < zoneCount; az++) {
                const publicSubnetIndex = publicAz.indexOf(az);
                if (publicSubnetIndex >= 0) {
                    natGateways.push({ azIndex: az, publicSubnetIndex });
                }
            }
            const uncovered = [...new Set(privateAz)].filter(az => !natGateways.some(nat => nat.azIndex === az));
            if (uncovered.length > 0) {
                throw new ComponentError(
                    COMPONENT_TYPE,
                    name,
                    `Zonal NAT Gateways need a public subnet in every zone with private subnets; missing zone index(es) ${uncovered.join(', ')}`,
                    "VALIDATION_ERROR",
                    { uncovered }
                );
            }
        }
    }

    // Route tables
    const routeTables: PlannedRouteTable[] = [];
    if (hasPublic) {
        routeTables.push({
            key: 'public',
            type: 'public',
            defaultRoute: internetGateway ? { target: 'internet-gateway' } : undefined
        });
    }
    if (hasPrivate) {
        if (strategy === 'zonal') {
            for (const az of [...new Set(privateAz)].sort((a, b) => a - b)) {
                routeTables.push({
                    key: `private-${az}`,
                    type: 'private',
                    azIndex: az,
                    defaultRoute: { target: 'nat-gateway', natIndex: natGateways.findIndex(nat => nat.azIndex === az) }
                });
            }
        } else {
            routeTables.push({
                key: 'private',
                type: 'private',
                defaultRoute: strategy === 'single' ? { target: 'nat-gateway', natIndex: 0 } : undefined
            });
        }
    }

    const subnets: PlannedSubnet[] = [
        ...cidrs.public.map((cidrBlock, index): PlannedSubnet => ({
            type: 'public',
            index,
            azIndex: publicAz[index],
            cidrBlock,
            routeTableKey: 'public'
        })),
        ...cidrs.private.map((cidrBlock, index): PlannedSubnet => ({
            type: 'private',
            index,
            azIndex: privateAz[index],
            cidrBlock,
            routeTableKey: strategy === 'zonal' ? `private-${privateAz[index]}` : 'private'
        }))
    ];

    return {
        zoneCount,
        subnets,
        internetGateway,
        natGateways,
        natGatewayStrategy: strategy,
        routeTables
    };
}

function resolveZoneCount(input: NetworkPlanInput): number {
    if (input.availabilityZones) {
        const zones = input.availabilityZones;
        ValidationUtils.validateRange(zones.length, "availabilityZones length", 1, MAX_AVAILABILITY_ZONE_COUNT, COMPONENT_TYPE, input.name);
        ValidationUtils.validateUnique(zones, "availabilityZones", COMPONENT_TYPE, input.name);
        if (input.availabilityZoneCount !== undefined && input.availabilityZoneCount !== zones.length) {
            throw new ValidationError(
                COMPONENT_TYPE,
                input.name,
                "availabilityZoneCount",
                input.availabilityZoneCount,
                `${zones.length} to match availabilityZones`
            );
        }
        return zones.length;
    }

    const count = input.availabilityZoneCount ?? DEFAULT_AVAILABILITY_ZONE_COUNT;
    ValidationUtils.validateRange(count, "availabilityZoneCount", 1, MAX_AVAILABILITY_ZONE_COUNT, COMPONENT_TYPE, input.name);
    return count;
}

/**
 * Explicit blocks are checked as given; computed tiers are allocated
 * afterwards, public first, around the explicit ones.
 */
function resolveSubnetCidrs(
    name: string,
    vpcCidr: string,
    zoneCount: number,
    publicTier?: SubnetTierSpec,
    privateTier?: SubnetTierSpec
): Record<SubnetType, string[]> {
    const tiers: [SubnetType, SubnetTierSpec | undefined][] = [['public', publicTier], ['private', privateTier]];
    const result: Record<SubnetType, string[]> = { public: [], private: [] };
    const explicit: string[] = [];

    for (const [type, tier] of tiers) {
        if (tier?.cidrBlocks) {
            if (tier.cidrBlocks.length === 0) {
                throw new ValidationError(COMPONENT_TYPE, name, `${type}Subnets.cidrBlocks`, "[]", "non-empty array");
            }
            if (tier.subnetPrefix !== undefined) {
                throw new ValidationError(COMPONENT_TYPE, name, `${type}Subnets`, "cidrBlocks and subnetPrefix", "only one of cidrBlocks or subnetPrefix");
            }
            for (const cidr of tier.cidrBlocks) {
                validateSubnetCidr(name, vpcCidr, cidr, `${type}Subnets.cidrBlocks`);
                const clash = explicit.find(other => cidrsOverlap(other, cidr));
                if (clash) {
                    throw new CidrError(cidr, `Subnet overlaps ${clash}`, { other: clash }, COMPONENT_TYPE, name);
                }
                explicit.push(cidr);
            }
            result[type] = [...tier.cidrBlocks];
        }
    }

    const vpcPrefix = parseCidr(vpcCidr).prefixLength;
    for (const [type, tier] of tiers) {
        if (tier && !tier.cidrBlocks) {
            const prefixLength = tier.subnetPrefix ?? DEFAULT_SUBNET_PREFIX;
            ValidationUtils.validateRange(prefixLength, `${type}Subnets.subnetPrefix`, Math.max(vpcPrefix, MIN_PREFIX_LENGTH), MAX_PREFIX_LENGTH, COMPONENT_TYPE, name);
            const requests = Array.from({ length: zoneCount }, () => ({ prefixLength }));
            result[type] = wrapCidr(name, () => allocateSubnets(vpcCidr, requests, [...explicit, ...result.public]));
        }
    }

    return result;
}

function validateSubnetCidr(name: string, vpcCidr: string, cidr: string, field: string): void {
    const block = wrapCidr(name, () => parseCidr(cidr));
    ValidationUtils.validateRange(block.prefixLength, `${field} prefix`, MIN_PREFIX_LENGTH, MAX_PREFIX_LENGTH, COMPONENT_TYPE, name);
    if (!cidrContains(vpcCidr, cidr)) {
        throw new CidrError(cidr, `Subnet is outside the VPC range ${vpcCidr}`, { vpcCidr }, COMPONENT_TYPE, name);
    }
}

/** Re-raise standalone CIDR errors under this component's name */
function wrapCidr<T>(name: string, fn: () => T): T {
    try {
        return fn();
    } catch (error) {
        if (error instanceof CidrError) {
            throw error.withComponent(COMPONENT_TYPE, name);
        }
        throw error;
    }
}
