import * as pulumi from "@pulumi/pulumi";
import { VPCComponent, VPCComponentArgs } from "./index";
import { DependencyError } from "../../shared/utils/error-handling";
import { Tags } from "../../shared/utils/aws-helpers";
import { MOCK_PUBLIC_IP, promiseOf } from "../../../tests/setup";

function required<T>(value: T | undefined): T {
    if (value === undefined) {
        throw new Error("expected a value");
    }
    return value;
}

const recordedOptions: pulumi.CustomResourceOptions[] = [];

// Records the options each child resource is declared with
class RecordingVPCComponent extends VPCComponent {
    protected childOptions(provider: pulumi.ProviderResource, extra?: pulumi.CustomResourceOptions): pulumi.CustomResourceOptions {
        const options = super.childOptions(provider, extra);
        recordedOptions.push(options);
        return options;
    }
}

describe("VPCComponent", () => {
    let testArgs: VPCComponentArgs;

    beforeEach(() => {
        testArgs = {
            region: "us-east-1",
            cidrBlock: "10.0.0.0/16",
            availabilityZoneCount: 2,
            publicSubnets: {},
            privateSubnets: {},
            tags: {
                Environment: "test"
            },
            logging: { logLevel: "silent" }
        };
    });

    test("should create VPC component with valid configuration", async () => {
        const vpc = new VPCComponent("test", testArgs);

        expect(await promiseOf(vpc.vpcId)).toBe("test-vpc_id");
        expect(await promiseOf(vpc.cidrBlock)).toBe("10.0.0.0/16");
        expect(await promiseOf(vpc.vpc.enableDnsHostnames)).toBe(true);
        expect(await promiseOf(vpc.vpc.enableDnsSupport)).toBe(true);
    });

    test("should validate region format", () => {
        expect(() => new VPCComponent("test", { ...testArgs, region: "" })).toThrow("Invalid region");
    });

    test("should surface planning errors", () => {
        expect(() => new VPCComponent("test", { ...testArgs, availabilityZoneCount: 0 }))
            .toThrow("Invalid availabilityZoneCount");
        expect(() => new VPCComponent("test", { ...testArgs, publicSubnets: undefined, natGatewayEnabled: true }))
            .toThrow("Cannot create NAT Gateways without public subnets");
    });

    test("should log planning failures as errors", () => {
        const logged = jest.spyOn(pulumi.log, "error").mockResolvedValue(undefined);

        expect(() => new VPCComponent("test", { ...testArgs, availabilityZoneCount: 0, logging: { logLevel: "error" } }))
            .toThrow("Invalid availabilityZoneCount");
        expect(logged).toHaveBeenCalledWith(expect.stringContaining("[custom:aws:VPC:test] Network planning failed | Context: "));
        expect(logged).toHaveBeenCalledWith(expect.stringContaining('"name":"ValidationError"'));
        logged.mockRestore();
    });

    describe("availability zones", () => {
        test("should pick the first zones of the region in sorted order", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(vpc.availabilityZones)).toEqual(["us-east-1a", "us-east-1b"]);
            expect(await promiseOf(vpc.subnets.public[1].availabilityZone)).toBe("us-east-1b");
            expect(await promiseOf(vpc.subnets.private[0].availabilityZone)).toBe("us-east-1a");
        });

        test("should use explicit zones as given", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                region: "eu-west-1",
                availabilityZoneCount: undefined,
                availabilityZones: ["eu-west-1b", "eu-west-1a"]
            });

            expect(await promiseOf(vpc.availabilityZones)).toEqual(["eu-west-1b", "eu-west-1a"]);
            expect(await promiseOf(vpc.subnets.public[0].availabilityZone)).toBe("eu-west-1b");
        });
    });

    describe("subnets", () => {
        test("should create one subnet per zone and tier", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(vpc.publicSubnetIds)).toEqual(["test-public-0_id", "test-public-1_id"]);
            expect(await promiseOf(vpc.privateSubnetIds)).toEqual(["test-private-0_id", "test-private-1_id"]);
            expect(await promiseOf(vpc.subnetIds)).toHaveLength(4);
            expect(await promiseOf(vpc.publicSubnetCidrBlocks)).toEqual(["10.0.0.0/24", "10.0.1.0/24"]);
            expect(await promiseOf(vpc.privateSubnetCidrBlocks)).toEqual(["10.0.2.0/24", "10.0.3.0/24"]);
        });

        test("should map public IPs only in public subnets", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(vpc.subnets.public[0].mapPublicIpOnLaunch)).toBe(true);
            expect(await promiseOf(vpc.subnets.private[0].mapPublicIpOnLaunch)).toBe(false);
        });

        test("should layer component, tier and generated tags", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                publicSubnets: { tags: { Tier: "web", Name: "ignored" } }
            });

            expect(await promiseOf(vpc.subnets.public[0].tags)).toEqual({
                ManagedBy: "Pulumi",
                Component: "custom:aws:VPC",
                Project: "network-test",
                Stack: "test",
                Environment: "test",
                Tier: "web",
                Name: "test-public-0",
                Type: "public"
            });
        });

        test("should reject reserved tag keys on resource tags", () => {
            expect(() => new VPCComponent("test", { ...testArgs, vpcTags: { "aws:reserved": "x" } }))
                .toThrow("Invalid tag key");
            expect(() => new VPCComponent("test", { ...testArgs, privateSubnets: { routeTableTags: { "AWS:owner": "x" } } }))
                .toThrow("Invalid tag key");
        });

        test("should count generated tags against the AWS tag limit", () => {
            const tags: Tags = {};
            for (let i = 0; i < 46; i++) {
                tags[`Key${i}`] = "value";
            }

            expect(() => new VPCComponent("test", { ...testArgs, tags }))
                .toThrow("Invalid tags: expected at most 50 tags, got number (51)");
        });

        test("should look up subnets by type and index", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(vpc.getSubnetIdsByType("private"))).toEqual(["test-private-0_id", "test-private-1_id"]);
            expect(await promiseOf(vpc.getSubnetId("public", 1))).toBe("test-public-1_id");
            expect(() => vpc.getSubnetId("private", 5)).toThrow("Invalid private subnet index");
        });
    });

    describe("internet gateway and routing", () => {
        test("should create Internet Gateway for public subnets", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(required(vpc.internetGatewayId))).toBe("test-igw_id");
            expect(await promiseOf(vpc.routes["public"].gatewayId)).toBe("test-igw_id");
            expect(await promiseOf(vpc.routes["public"].destinationCidrBlock)).toBe("0.0.0.0/0");
        });

        test("should not create Internet Gateway when disabled", () => {
            const vpc = new VPCComponent("test", { ...testArgs, internetGatewayEnabled: false });

            expect(vpc.internetGatewayId).toBeUndefined();
            expect(vpc.routes["public"]).toBeUndefined();
        });

        test("should share one private route table without NAT", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(await promiseOf(required(vpc.publicRouteTableId))).toBe("test-public-rt_id");
            expect(await promiseOf(vpc.privateRouteTableIds)).toEqual(["test-private-rt_id"]);
            expect(vpc.routes["private"]).toBeUndefined();
            expect(await promiseOf(vpc.natGatewayIds)).toEqual([]);
        });

        test("should associate every subnet with its route table", async () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(vpc.routeTableAssociations).toHaveLength(4);
            expect(await promiseOf(vpc.routeTableAssociations[0].routeTableId)).toBe("test-public-rt_id");
            expect(await promiseOf(vpc.routeTableAssociations[3].subnetId)).toBe("test-private-1_id");
            expect(await promiseOf(vpc.routeTableAssociations[3].routeTableId)).toBe("test-private-rt_id");
        });

        test("should support private-only networks", async () => {
            const vpc = new VPCComponent("test", { ...testArgs, publicSubnets: undefined });

            expect(vpc.internetGateway).toBeUndefined();
            expect(vpc.publicRouteTableId).toBeUndefined();
            expect(await promiseOf(vpc.publicSubnetIds)).toEqual([]);
            expect(await promiseOf(vpc.routeTableIds)).toEqual(["test-private-rt_id"]);
        });
    });

    describe("NAT gateways", () => {
        test("should create a NAT Gateway and private route table per zone", async () => {
            const vpc = new VPCComponent("test", { ...testArgs, natGatewayEnabled: true });

            expect(await promiseOf(vpc.natGatewayIds)).toEqual(["test-nat-0_id", "test-nat-1_id"]);
            expect(await promiseOf(vpc.natPublicIps)).toEqual([MOCK_PUBLIC_IP, MOCK_PUBLIC_IP]);
            expect(await promiseOf(vpc.natGateways[1].subnetId)).toBe("test-public-1_id");
            expect(await promiseOf(vpc.natGateways[1].allocationId)).toBe("test-nat-eip-1_id");
            expect(await promiseOf(vpc.natEips[0].domain)).toBe("vpc");
            expect(await promiseOf(vpc.privateRouteTableIds)).toEqual(["test-private-rt-0_id", "test-private-rt-1_id"]);
            expect(await promiseOf(vpc.routes["private-1"].natGatewayId)).toBe("test-nat-1_id");
        });

        test("should tag NAT Gateways with their strategy", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                natGatewayEnabled: true,
                natGatewayTags: { CostCenter: "networking" }
            });

            const tags = await promiseOf(vpc.natGateways[0].tags);
            expect(tags).toMatchObject({ Name: "test-nat-0", Strategy: "zonal", CostCenter: "networking" });
        });

        test("should make EIPs and NAT Gateways wait for the Internet Gateway", async () => {
            recordedOptions.length = 0;
            const vpc = new RecordingVPCComponent("test", { ...testArgs, natGatewayEnabled: true });
            const internetGateway = required(vpc.internetGateway);

            const waiting = recordedOptions.filter(options => options.dependsOn !== undefined);
            expect(waiting).toHaveLength(4);
            for (const options of waiting) {
                expect(options.dependsOn).toEqual([internetGateway]);
            }
            expect(await promiseOf(vpc.natGatewayIds)).toHaveLength(2);
        });

        test("should share a single NAT Gateway", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                natGatewayEnabled: true,
                natGatewayStrategy: "single"
            });

            expect(await promiseOf(vpc.natGatewayIds)).toEqual(["test-nat-single_id"]);
            expect(await promiseOf(vpc.privateRouteTableIds)).toEqual(["test-private-rt_id"]);
            expect(await promiseOf(vpc.routes["private"].natGatewayId)).toBe("test-nat-single_id");
        });
    });

    describe("VPC endpoints", () => {
        test("should not create endpoints unless configured", () => {
            const vpc = new VPCComponent("test", testArgs);

            expect(vpc.endpoints).toBeUndefined();
        });

        test("should attach gateway endpoints to private route tables", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                endpoints: { gatewayServices: ["s3"] }
            });
            const endpoints = required(vpc.endpoints);

            expect(await promiseOf(endpoints.gatewayEndpointIds)).toEqual({ s3: "test-endpoints-s3-gateway_id" });
            expect(await promiseOf(endpoints.gatewayEndpoints["s3"].routeTableIds)).toEqual(["test-private-rt_id"]);
            expect(endpoints.securityGroup).toBeUndefined();
        });

        test("should include the public route table on request", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                endpoints: { gatewayServices: ["dynamodb"], attachToPublicRouteTables: true }
            });
            const endpoints = required(vpc.endpoints);

            expect(await promiseOf(endpoints.gatewayEndpoints["dynamodb"].routeTableIds))
                .toEqual(["test-public-rt_id", "test-private-rt_id"]);
        });

        test("should place interface endpoints in one private subnet per zone", async () => {
            const vpc = new VPCComponent("test", {
                ...testArgs,
                endpoints: { interfaceServices: ["ecr.api"] }
            });
            const endpoints = required(vpc.endpoints);

            expect(await promiseOf(endpoints.interfaceEndpointIds)).toEqual({ "ecr.api": "test-endpoints-ecr-api-interface_id" });
            expect(await promiseOf(endpoints.interfaceEndpoints["ecr.api"].subnetIds))
                .toEqual(["test-private-0_id", "test-private-1_id"]);
            expect(await promiseOf(endpoints.interfaceEndpoints["ecr.api"].serviceName)).toBe("com.amazonaws.us-east-1.ecr.api");
        });

        test("should require private subnets for interface endpoints", () => {
            const build = () => new VPCComponent("test", {
                ...testArgs,
                privateSubnets: undefined,
                endpoints: { interfaceServices: ["logs"] }
            });

            expect(build).toThrow(DependencyError);
            expect(build).toThrow("Dependency error with subnet tier 'privateSubnets': interface endpoints (logs) need private subnets to host them");
        });

        test("should require a route table for gateway endpoints", () => {
            expect(() => new VPCComponent("test", {
                ...testArgs,
                privateSubnets: undefined,
                endpoints: { gatewayServices: ["s3"] }
            })).toThrow("Dependency error with route table 'private': gateway endpoints need a private route table, or attachToPublicRouteTables");
        });
    });
});
