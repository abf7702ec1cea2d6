import { VPCComponentArgs } from "../components/aws/vpc";

/**
 * A network as described in stack configuration or a YAML network file
 */
export interface NetworkConfig extends VPCComponentArgs {
    /** Logical name; prefixes every resource name */
    name: string;
}

/** Keys read from the `network` stack configuration namespace */
export const STRING_KEYS = ['name', 'region', 'cidrBlock', 'instanceTenancy', 'natGatewayStrategy'] as const;
export const NUMBER_KEYS = ['availabilityZoneCount'] as const;
export const BOOLEAN_KEYS = [
    'enableDnsHostnames',
    'enableDnsSupport',
    'mapPublicIpOnLaunch',
    'internetGatewayEnabled',
    'natGatewayEnabled'
] as const;
export const OBJECT_KEYS = [
    'availabilityZones',
    'publicSubnets',
    'privateSubnets',
    'endpoints',
    'logging',
    'tags',
    'vpcTags',
    'internetGatewayTags',
    'natGatewayTags'
] as const;
