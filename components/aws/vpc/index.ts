import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";
import { BaseAWSComponent, BaseComponentArgs } from "../../shared/base";
import { NatGatewayStrategy, NetworkingOutputs, SubnetTierSpec, SubnetType } from "../../shared/interfaces";
import { selectAvailabilityZones, Tags } from "../../shared/utils/aws-helpers";
import { DependencyError, ValidationError, ValidationUtils } from "../../shared/utils/error-handling";
import { VpcEndpointsComponent, GatewayEndpointService } from "../vpc-endpoints";
import { NetworkPlan, PlannedSubnet, planNetwork } from "./network-plan";

export * from "./network-plan";

/**
 * Endpoint options for VPC Component
 */
export interface VPCEndpointOptions {
    gatewayServices?: GatewayEndpointService[];
    interfaceServices?: string[];
    /** Also attach gateway endpoints to the public route table */
    attachToPublicRouteTables?: boolean;
    privateDnsEnabled?: boolean;
    allowedCidrBlocks?: string[];
    tags?: Tags;
}

/**
 * Arguments for VPC Component
 */
export interface VPCComponentArgs extends BaseComponentArgs {
    /** AWS region for VPC deployment */
    region: string;
    cidrBlock: string;
    /** Explicit zone names; when omitted the first availabilityZoneCount available zones are used */
    availabilityZones?: string[];
    /** @default 2 */
    availabilityZoneCount?: number;
    publicSubnets?: SubnetTierSpec;
    privateSubnets?: SubnetTierSpec;
    /** @default true */
    enableDnsHostnames?: boolean;
    /** @default true */
    enableDnsSupport?: boolean;
    instanceTenancy?: 'default' | 'dedicated';
    /** Assign public IPs on launch in public subnets. @default true */
    mapPublicIpOnLaunch?: boolean;
    /** Defaults to true when public subnets are requested */
    internetGatewayEnabled?: boolean;
    natGatewayEnabled?: boolean;
    /**
     * NAT Gateway strategy:
     * - 'zonal': One NAT Gateway per AZ
     * - 'single': One NAT Gateway shared by every AZ
     * @default 'zonal'
     */
    natGatewayStrategy?: NatGatewayStrategy;
    endpoints?: VPCEndpointOptions;
    vpcTags?: Tags;
    internetGatewayTags?: Tags;
    natGatewayTags?: Tags;
}

/**
 * Outputs from VPC Component
 */
export interface VPCComponentOutputs extends NetworkingOutputs {
    vpcId: pulumi.Output<string>;
    vpcArn: pulumi.Output<string>;
    cidrBlock: pulumi.Output<string>;
    availabilityZones: pulumi.Output<string[]>;
    publicSubnetIds: pulumi.Output<string[]>;
    privateSubnetIds: pulumi.Output<string[]>;
    publicSubnetCidrBlocks: pulumi.Output<string[]>;
    privateSubnetCidrBlocks: pulumi.Output<string[]>;
    internetGatewayId?: pulumi.Output<string>;
    natGatewayIds: pulumi.Output<string[]>;
    natPublicIps: pulumi.Output<string[]>;
    publicRouteTableId?: pulumi.Output<string>;
    privateRouteTableIds: pulumi.Output<string[]>;
}

/**
 * VPC with public and private subnets across availability zones, an Internet
 * Gateway, NAT Gateways, route tables and optional VPC endpoints
 */
export class VPCComponent extends BaseAWSComponent implements VPCComponentOutputs {
    public readonly vpcId: pulumi.Output<string>;
    public readonly vpcArn: pulumi.Output<string>;
    public readonly cidrBlock: pulumi.Output<string>;
    public readonly availabilityZones: pulumi.Output<string[]>;
    public readonly subnetIds: pulumi.Output<string[]>;
    public readonly publicSubnetIds: pulumi.Output<string[]>;
    public readonly privateSubnetIds: pulumi.Output<string[]>;
    public readonly publicSubnetCidrBlocks: pulumi.Output<string[]>;
    public readonly privateSubnetCidrBlocks: pulumi.Output<string[]>;
    public readonly internetGatewayId?: pulumi.Output<string>;
    public readonly natGatewayIds: pulumi.Output<string[]>;
    public readonly natPublicIps: pulumi.Output<string[]>;
    public readonly publicRouteTableId?: pulumi.Output<string>;
    public readonly privateRouteTableIds: pulumi.Output<string[]>;
    public readonly routeTableIds: pulumi.Output<string[]>;
    public readonly endpoints?: VpcEndpointsComponent;

    /** The computed topology the resources were declared from */
    public readonly plan: NetworkPlan;

    public readonly vpc: aws.ec2.Vpc;
    public readonly internetGateway?: aws.ec2.InternetGateway;
    public readonly natEips: aws.ec2.Eip[] = [];
    public readonly natGateways: aws.ec2.NatGateway[] = [];
    public readonly subnets: { [type in SubnetType]: aws.ec2.Subnet[] } = { public: [], private: [] };
    public readonly routeTables: { [key: string]: aws.ec2.RouteTable } = {};
    public readonly routes: { [key: string]: aws.ec2.Route } = {};
    public readonly routeTableAssociations: aws.ec2.RouteTableAssociation[] = [];

    constructor(
        name: string,
        args: VPCComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super("custom:aws:VPC", name, args, opts);

        ValidationUtils.validateRequired(args.region, "region", "VPCComponent", name);
        ValidationUtils.validateRequired(args.cidrBlock, "cidrBlock", "VPCComponent", name);

        try {
            this.plan = planNetwork({ name, ...args });
        } catch (error) {
            this.logger.error("Network planning failed", error instanceof Error ? error : new Error(String(error)));
            throw error;
        }

        this.logger.info(`Planned ${this.plan.subnets.length} subnet(s) across ${this.plan.zoneCount} zone(s)`, {
            natGateways: this.plan.natGateways.length,
            natGatewayStrategy: this.plan.natGatewayStrategy,
            routeTables: this.plan.routeTables.map(rt => rt.key)
        });

        const provider = this.resolveProvider(opts, this.region);

        this.availabilityZones = this.resolveAvailabilityZones(args, provider);
        this.vpc = this.createVpc(args, provider);

        if (this.plan.internetGateway) {
            this.internetGateway = this.createInternetGateway(args, provider);
        }

        this.createSubnets(args, provider);
        this.createNatGateways(args, provider);
        this.createRouteTables(args, provider);
        this.associateSubnets(provider);

        if (args.endpoints) {
            this.endpoints = this.createEndpoints(args, args.endpoints, provider);
        }

        this.vpcId = this.vpc.id;
        this.vpcArn = this.vpc.arn;
        this.cidrBlock = this.vpc.cidrBlock;
        this.internetGatewayId = this.internetGateway?.id;

        this.publicSubnetIds = pulumi.all(this.subnets.public.map(subnet => subnet.id));
        this.privateSubnetIds = pulumi.all(this.subnets.private.map(subnet => subnet.id));
        this.publicSubnetCidrBlocks = pulumi.output(this.plan.subnets.filter(s => s.type === 'public').map(s => s.cidrBlock));
        this.privateSubnetCidrBlocks = pulumi.output(this.plan.subnets.filter(s => s.type === 'private').map(s => s.cidrBlock));
        this.subnetIds = pulumi.all([...this.subnets.public, ...this.subnets.private].map(subnet => subnet.id));

        this.natGatewayIds = pulumi.all(this.natGateways.map(nat => nat.id));
        this.natPublicIps = pulumi.all(this.natEips.map(eip => eip.publicIp));

        this.publicRouteTableId = this.routeTables['public']?.id;
        const privateTables = this.plan.routeTables
            .filter(rt => rt.type === 'private')
            .map(rt => this.routeTables[rt.key].id);
        this.privateRouteTableIds = pulumi.all(privateTables);
        this.routeTableIds = pulumi.all(Object.values(this.routeTables).map(rt => rt.id));

        this.registerOutputs({
            vpcId: this.vpcId,
            vpcArn: this.vpcArn,
            cidrBlock: this.cidrBlock,
            availabilityZones: this.availabilityZones,
            subnetIds: this.subnetIds,
            publicSubnetIds: this.publicSubnetIds,
            privateSubnetIds: this.privateSubnetIds,
            publicSubnetCidrBlocks: this.publicSubnetCidrBlocks,
            privateSubnetCidrBlocks: this.privateSubnetCidrBlocks,
            internetGatewayId: this.internetGatewayId,
            natGatewayIds: this.natGatewayIds,
            natPublicIps: this.natPublicIps,
            publicRouteTableId: this.publicRouteTableId,
            privateRouteTableIds: this.privateRouteTableIds,
            routeTableIds: this.routeTableIds,
            gatewayEndpointIds: this.endpoints?.gatewayEndpointIds,
            interfaceEndpointIds: this.endpoints?.interfaceEndpointIds
        });
    }

    /**
     * Explicit zones are used as given; otherwise look up the region's available zones
     */
    private resolveAvailabilityZones(args: VPCComponentArgs, provider: pulumi.ProviderResource): pulumi.Output<string[]> {
        if (args.availabilityZones) {
            return pulumi.output(args.availabilityZones);
        }

        const count = this.plan.zoneCount;
        return pulumi.output(aws.getAvailabilityZones({
            state: "available"
        }, { provider })).apply(azs => selectAvailabilityZones(azs.names, count, this.region));
    }

    private createVpc(args: VPCComponentArgs, provider: pulumi.ProviderResource): aws.ec2.Vpc {
        const resourceName = `${this.componentName}-vpc`;
        this.logger.resourceDeclared("aws:ec2:Vpc", resourceName, { cidrBlock: args.cidrBlock });

        return new aws.ec2.Vpc(resourceName, {
            cidrBlock: args.cidrBlock,
            enableDnsHostnames: args.enableDnsHostnames ?? true,
            enableDnsSupport: args.enableDnsSupport ?? true,
            instanceTenancy: args.instanceTenancy ?? "default",
            tags: this.mergeTags(args.vpcTags, { Name: resourceName })
        }, this.childOptions(provider));
    }

    private createInternetGateway(args: VPCComponentArgs, provider: pulumi.ProviderResource): aws.ec2.InternetGateway {
        const resourceName = `${this.componentName}-igw`;
        this.logger.resourceDeclared("aws:ec2:InternetGateway", resourceName);

        return new aws.ec2.InternetGateway(resourceName, {
            vpcId: this.vpc.id,
            tags: this.mergeTags(args.internetGatewayTags, { Name: resourceName })
        }, this.childOptions(provider));
    }

    private createSubnets(args: VPCComponentArgs, provider: pulumi.ProviderResource): void {
        for (const planned of this.plan.subnets) {
            const tier = planned.type === 'public' ? args.publicSubnets : args.privateSubnets;
            const resourceName = `${this.componentName}-${planned.type}-${planned.index}`;
            this.logger.resourceDeclared("aws:ec2:Subnet", resourceName, {
                cidrBlock: planned.cidrBlock,
                azIndex: planned.azIndex
            });

            const subnet = new aws.ec2.Subnet(resourceName, {
                vpcId: this.vpc.id,
                cidrBlock: planned.cidrBlock,
                availabilityZone: this.availabilityZones.apply(zones => zones[planned.azIndex]),
                mapPublicIpOnLaunch: planned.type === 'public' && (args.mapPublicIpOnLaunch ?? true),
                tags: this.mergeTags(tier?.tags, {
                    Name: resourceName,
                    Type: planned.type
                })
            }, this.childOptions(provider));

            this.subnets[planned.type].push(subnet);
        }
    }

    /**
     * One EIP and NAT Gateway per planned NAT. Both wait for the Internet Gateway,
     * since AWS rejects public NAT traffic until the VPC has one attached.
     */
    private createNatGateways(args: VPCComponentArgs, provider: pulumi.ProviderResource): void {
        const strategy = this.plan.natGatewayStrategy;
        if (!strategy || !this.internetGateway) {
            return;
        }

        const dependsOn = [this.internetGateway];
        this.logger.info(strategy === 'single'
            ? "Creating a single NAT Gateway shared by all zones"
            : `Creating zonal NAT Gateways (one per AZ) for high availability`);

        for (const nat of this.plan.natGateways) {
            const suffix = strategy === 'single' ? 'single' : `${nat.azIndex}`;
            const eipName = `${this.componentName}-nat-eip-${suffix}`;
            const natName = `${this.componentName}-nat-${suffix}`;

            const eip = new aws.ec2.Eip(eipName, {
                domain: "vpc",
                tags: this.mergeTags(args.natGatewayTags, { Name: eipName })
            }, this.childOptions(provider, { dependsOn }));

            const natGateway = new aws.ec2.NatGateway(natName, {
                allocationId: eip.id,
                subnetId: this.subnets.public[nat.publicSubnetIndex].id,
                tags: this.mergeTags(args.natGatewayTags, {
                    Name: natName,
                    Strategy: strategy
                })
            }, this.childOptions(provider, { dependsOn }));

            this.logger.resourceDeclared("aws:ec2:NatGateway", natName, { azIndex: nat.azIndex });
            this.natEips.push(eip);
            this.natGateways.push(natGateway);
        }
    }

    private createRouteTables(args: VPCComponentArgs, provider: pulumi.ProviderResource): void {
        for (const planned of this.plan.routeTables) {
            const tier = planned.type === 'public' ? args.publicSubnets : args.privateSubnets;
            const resourceName = planned.key === 'public' || planned.key === 'private'
                ? `${this.componentName}-${planned.key}-rt`
                : `${this.componentName}-private-rt-${planned.azIndex}`;

            const routeTable = new aws.ec2.RouteTable(resourceName, {
                vpcId: this.vpc.id,
                tags: this.mergeTags(tier?.routeTableTags, {
                    Name: resourceName,
                    Type: planned.type
                })
            }, this.childOptions(provider));
            this.routeTables[planned.key] = routeTable;
            this.logger.resourceDeclared("aws:ec2:RouteTable", resourceName);

            const defaultRoute = planned.defaultRoute;
            if (!defaultRoute) {
                continue;
            }

            const target = defaultRoute.target === 'internet-gateway'
                ? { gatewayId: this.internetGateway?.id }
                : { natGatewayId: this.natGateways[defaultRoute.natIndex].id };

            this.routes[planned.key] = new aws.ec2.Route(`${resourceName}-default`, {
                routeTableId: routeTable.id,
                destinationCidrBlock: "0.0.0.0/0",
                ...target
            }, this.childOptions(provider));
        }
    }

    private associateSubnets(provider: pulumi.ProviderResource): void {
        this.plan.subnets.forEach(planned => {
            const subnet = this.subnets[planned.type][planned.index];
            this.routeTableAssociations.push(new aws.ec2.RouteTableAssociation(
                `${this.componentName}-${planned.type}-${planned.index}-rta`,
                {
                    subnetId: subnet.id,
                    routeTableId: this.routeTables[planned.routeTableKey].id
                },
                this.childOptions(provider)
            ));
        });
    }

    private createEndpoints(
        args: VPCComponentArgs,
        options: VPCEndpointOptions,
        provider: pulumi.ProviderResource
    ): VpcEndpointsComponent {
        const routeTableIds = this.plan.routeTables
            .filter(rt => rt.type === 'private' || options.attachToPublicRouteTables)
            .map(rt => this.routeTables[rt.key].id);

        // An interface endpoint takes at most one subnet per zone
        const interfaceSubnets = firstPerZone(this.plan.subnets.filter(s => s.type === 'private'))
            .map(planned => this.subnets.private[planned.index].id);

        if ((options.gatewayServices ?? []).length > 0 && routeTableIds.length === 0) {
            throw new DependencyError("VPCComponent", this.componentName, "route table", "private",
                "gateway endpoints need a private route table, or attachToPublicRouteTables");
        }
        if ((options.interfaceServices ?? []).length > 0 && interfaceSubnets.length === 0) {
            throw new DependencyError("VPCComponent", this.componentName, "subnet tier", "privateSubnets",
                `interface endpoints (${(options.interfaceServices ?? []).join(', ')}) need private subnets to host them`);
        }

        return new VpcEndpointsComponent(`${this.componentName}-endpoints`, {
            region: this.region,
            vpcId: this.vpc.id,
            vpcCidrBlock: this.vpc.cidrBlock,
            routeTableIds,
            subnetIds: interfaceSubnets,
            gatewayServices: options.gatewayServices,
            interfaceServices: options.interfaceServices,
            privateDnsEnabled: options.privateDnsEnabled,
            allowedCidrBlocks: options.allowedCidrBlocks,
            endpointTags: options.tags,
            tags: args.tags,
            logging: args.logging
        }, { parent: this, provider });
    }

    public getSubnetIdsByType(type: SubnetType): pulumi.Output<string[]> {
        return type === 'public' ? this.publicSubnetIds : this.privateSubnetIds;
    }

    public getSubnetId(type: SubnetType, index: number): pulumi.Output<string> {
        const subnet = this.subnets[type][index];
        if (!subnet) {
            throw new ValidationError("VPCComponent", this.componentName, `${type} subnet index`, index,
                `index below ${this.subnets[type].length}`);
        }
        return subnet.id;
    }
}

function firstPerZone(subnets: PlannedSubnet[]): PlannedSubnet[] {
    const seen = new Set<number>();
    return subnets.filter(subnet => {
        if (seen.has(subnet.azIndex)) {
            return false;
        }
        seen.add(subnet.azIndex);
        return true;
    });
}
