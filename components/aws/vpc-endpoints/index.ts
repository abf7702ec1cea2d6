import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";
import { BaseAWSComponent, BaseComponentArgs } from "../../shared/base";
import { endpointServiceName, Tags } from "../../shared/utils/aws-helpers";
import { ValidationError, ValidationUtils } from "../../shared/utils/error-handling";

export const GATEWAY_ENDPOINT_SERVICES = ['s3', 'dynamodb'] as const;
export type GatewayEndpointService = typeof GATEWAY_ENDPOINT_SERVICES[number];

const INTERFACE_SERVICE_PATTERN = /^[a-z0-9]+([.-][a-z0-9]+)*$/;

/**
 * Arguments for VPC Endpoints Component
 */
export interface VpcEndpointsComponentArgs extends BaseComponentArgs {
    /** AWS region; also forms the endpoint service names */
    region: string;
    vpcId: pulumi.Input<string>;
    /** VPC range, the default source for HTTPS ingress to interface endpoints */
    vpcCidrBlock: pulumi.Input<string>;
    /** Route tables that gateway endpoints are attached to */
    routeTableIds?: pulumi.Input<string>[];
    /** Subnets for interface endpoint network interfaces, at most one per zone */
    subnetIds?: pulumi.Input<string>[];
    gatewayServices?: GatewayEndpointService[];
    /** Interface endpoint service suffixes, e.g. "ecr.api", "logs" */
    interfaceServices?: string[];
    /** @default true */
    privateDnsEnabled?: boolean;
    /** Ingress sources for the endpoint security group; defaults to the VPC range */
    allowedCidrBlocks?: pulumi.Input<string>[];
    /** Extra security groups attached to every interface endpoint */
    additionalSecurityGroupIds?: pulumi.Input<string>[];
    /** Tags for the security group and every endpoint */
    endpointTags?: Tags;
}

/**
 * Outputs from VPC Endpoints Component
 */
export interface VpcEndpointsComponentOutputs {
    gatewayEndpointIds: pulumi.Output<Record<string, string>>;
    interfaceEndpointIds: pulumi.Output<Record<string, string>>;
    securityGroupId?: pulumi.Output<string>;
}

/**
 * Gateway and interface VPC endpoints with the security group that fronts the interface endpoints
 */
export class VpcEndpointsComponent extends BaseAWSComponent implements VpcEndpointsComponentOutputs {
    public readonly gatewayEndpointIds: pulumi.Output<Record<string, string>>;
    public readonly interfaceEndpointIds: pulumi.Output<Record<string, string>>;
    public readonly securityGroupId?: pulumi.Output<string>;

    public readonly gatewayEndpoints: { [service: string]: aws.ec2.VpcEndpoint } = {};
    public readonly interfaceEndpoints: { [service: string]: aws.ec2.VpcEndpoint } = {};
    public readonly securityGroup?: aws.ec2.SecurityGroup;

    constructor(
        name: string,
        args: VpcEndpointsComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super("custom:aws:VpcEndpoints", name, args, opts);

        const gatewayServices = args.gatewayServices ?? [];
        const interfaceServices = args.interfaceServices ?? [];
        this.validateServices(args, gatewayServices, interfaceServices);

        const provider = this.resolveProvider(opts, this.region);

        for (const service of gatewayServices) {
            this.gatewayEndpoints[service] = this.createGatewayEndpoint(service, args, provider);
        }

        if (interfaceServices.length > 0) {
            this.securityGroup = this.createSecurityGroup(args, provider);
            const securityGroupIds = [this.securityGroup.id, ...(args.additionalSecurityGroupIds ?? [])];

            for (const service of interfaceServices) {
                this.interfaceEndpoints[service] = this.createInterfaceEndpoint(service, args, securityGroupIds, provider);
            }
            this.securityGroupId = this.securityGroup.id;
        }

        this.gatewayEndpointIds = collectIds(this.gatewayEndpoints);
        this.interfaceEndpointIds = collectIds(this.interfaceEndpoints);

        this.registerOutputs({
            gatewayEndpointIds: this.gatewayEndpointIds,
            interfaceEndpointIds: this.interfaceEndpointIds,
            securityGroupId: this.securityGroupId
        });
    }

    private validateServices(
        args: VpcEndpointsComponentArgs,
        gatewayServices: string[],
        interfaceServices: string[]
    ): void {
        const type = "VpcEndpointsComponent";

        gatewayServices.forEach(service =>
            ValidationUtils.validateEnum<string>(service, "gatewayServices", GATEWAY_ENDPOINT_SERVICES, type, this.componentName));
        ValidationUtils.validateUnique(gatewayServices, "gatewayServices", type, this.componentName);

        interfaceServices.forEach(service =>
            ValidationUtils.validateFormat(service, "interfaceServices", INTERFACE_SERVICE_PATTERN, type, this.componentName, "service suffix such as ecr.api"));
        ValidationUtils.validateUnique(interfaceServices, "interfaceServices", type, this.componentName);
        ValidationUtils.validateUnique(interfaceServices.map(interfaceResourceSuffix), "interfaceServices resource name", type, this.componentName);

        if (gatewayServices.length > 0 && (args.routeTableIds ?? []).length === 0) {
            throw new ValidationError(type, this.componentName, "routeTableIds", "[]", "at least one route table for gateway endpoints");
        }
        if (interfaceServices.length > 0 && (args.subnetIds ?? []).length === 0) {
            throw new ValidationError(type, this.componentName, "subnetIds", "[]", "at least one subnet for interface endpoints");
        }
    }

    /**
     * Gateway endpoints are route-table targets; S3 and DynamoDB traffic stays on the AWS network
     */
    private createGatewayEndpoint(
        service: GatewayEndpointService,
        args: VpcEndpointsComponentArgs,
        provider: pulumi.ProviderResource
    ): aws.ec2.VpcEndpoint {
        const resourceName = `${this.componentName}-${service}-gateway`;
        this.logger.resourceDeclared("aws:ec2:VpcEndpoint", resourceName, { service });

        return new aws.ec2.VpcEndpoint(resourceName, {
            vpcId: args.vpcId,
            serviceName: endpointServiceName(this.region, service),
            vpcEndpointType: "Gateway",
            routeTableIds: args.routeTableIds,
            tags: this.mergeTags(args.endpointTags, {
                Name: resourceName,
                Service: service
            })
        }, this.childOptions(provider));
    }

    /**
     * HTTPS in from the allowed ranges, anything out
     */
    private createSecurityGroup(args: VpcEndpointsComponentArgs, provider: pulumi.ProviderResource): aws.ec2.SecurityGroup {
        const resourceName = `${this.componentName}-endpoints-sg`;
        this.logger.resourceDeclared("aws:ec2:SecurityGroup", resourceName);

        return new aws.ec2.SecurityGroup(resourceName, {
            vpcId: args.vpcId,
            description: "HTTPS access to interface VPC endpoints",
            ingress: [{
                description: "HTTPS from allowed ranges",
                protocol: "tcp",
                fromPort: 443,
                toPort: 443,
                cidrBlocks: args.allowedCidrBlocks ?? [args.vpcCidrBlock]
            }],
            egress: [{
                description: "All outbound traffic",
                protocol: "-1",
                fromPort: 0,
                toPort: 0,
                cidrBlocks: ["0.0.0.0/0"]
            }],
            tags: this.mergeTags(args.endpointTags, {
                Name: resourceName
            })
        }, this.childOptions(provider));
    }

    private createInterfaceEndpoint(
        service: string,
        args: VpcEndpointsComponentArgs,
        securityGroupIds: pulumi.Input<string>[],
        provider: pulumi.ProviderResource
    ): aws.ec2.VpcEndpoint {
        const resourceName = `${this.componentName}-${interfaceResourceSuffix(service)}-interface`;
        this.logger.resourceDeclared("aws:ec2:VpcEndpoint", resourceName, { service });

        return new aws.ec2.VpcEndpoint(resourceName, {
            vpcId: args.vpcId,
            serviceName: endpointServiceName(this.region, service),
            vpcEndpointType: "Interface",
            subnetIds: args.subnetIds,
            securityGroupIds: securityGroupIds,
            privateDnsEnabled: args.privateDnsEnabled ?? true,
            tags: this.mergeTags(args.endpointTags, {
                Name: resourceName,
                Service: service
            })
        }, this.childOptions(provider));
    }
}

/**
 * Resource names use dashes where the service suffix has dots
 */
function interfaceResourceSuffix(service: string): string {
    return service.replace(/\./g, '-');
}

function collectIds(endpoints: { [service: string]: aws.ec2.VpcEndpoint }): pulumi.Output<Record<string, string>> {
    return pulumi.all(
        Object.fromEntries(Object.entries(endpoints).map(([service, endpoint]) => [service, endpoint.id]))
    );
}
