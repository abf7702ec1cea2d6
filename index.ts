import * as path from "path";
import * as pulumi from "@pulumi/pulumi";
import { VPCComponent } from "./components/aws/vpc";
import { ConfigManager } from "./config/config-manager";

/**
 * Network stack program.
 * Reads the network from `network:configFile` (YAML) when set, otherwise from
 * the `network:*` stack configuration, and declares the VPC.
 */
const networkConfig = new pulumi.Config("network");
const awsConfig = new pulumi.Config("aws");

const configFile = networkConfig.get("configFile");
const network = configFile
    ? ConfigManager.loadConfig(path.resolve(configFile))
    : ConfigManager.fromPulumiConfig(networkConfig, awsConfig);

const vpc = new VPCComponent(network.name, ConfigManager.toComponentArgs(network));

export const vpcId = vpc.vpcId;
export const vpcArn = vpc.vpcArn;
export const vpcCidrBlock = vpc.cidrBlock;
export const availabilityZones = vpc.availabilityZones;
export const publicSubnetIds = vpc.publicSubnetIds;
export const privateSubnetIds = vpc.privateSubnetIds;
export const publicSubnetCidrBlocks = vpc.publicSubnetCidrBlocks;
export const privateSubnetCidrBlocks = vpc.privateSubnetCidrBlocks;
export const internetGatewayId = vpc.internetGatewayId;
export const natGatewayIds = vpc.natGatewayIds;
export const natPublicIps = vpc.natPublicIps;
export const publicRouteTableId = vpc.publicRouteTableId;
export const privateRouteTableIds = vpc.privateRouteTableIds;
export const gatewayEndpointIds = vpc.endpoints?.gatewayEndpointIds;
export const interfaceEndpointIds = vpc.endpoints?.interfaceEndpointIds;
export const endpointSecurityGroupId = vpc.endpoints?.securityGroupId;
