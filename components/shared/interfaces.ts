import * as pulumi from "@pulumi/pulumi";
import { Tags } from "./utils/aws-helpers";

/**
 * Common interfaces used across the network components
 */

export type SubnetType = 'public' | 'private';

export type NatGatewayStrategy = 'zonal' | 'single';

/**
 * One tier of subnets. Give either explicit CIDR blocks, placed round-robin
 * across zones, or a prefix length to carve one subnet per zone from the VPC range.
 */
export interface SubnetTierSpec {
    /** Explicit CIDR blocks */
    cidrBlocks?: string[];
    /** Prefix length of computed subnets (default 24) */
    subnetPrefix?: number;
    /** Tags for the tier's subnets */
    tags?: Tags;
    /** Tags for the tier's route tables */
    routeTableTags?: Tags;
}

/**
 * Common output interface for components that create networking resources
 */
export interface NetworkingOutputs {
    vpcId?: pulumi.Output<string>;
    subnetIds?: pulumi.Output<string[]>;
    securityGroupIds?: pulumi.Output<string[]>;
    routeTableIds?: pulumi.Output<string[]>;
}
