import * as aws from "@pulumi/aws";

/**
 * AWS-specific utility functions
 */

export type Tags = { [key: string]: string };

/**
 * Merge tag layers left to right; later layers win and undefined layers are skipped
 */
export function mergeTagLayers(...layers: (Tags | undefined)[]): Tags {
    return layers.reduce<Tags>((acc, layer) => ({ ...acc, ...layer }), {});
}

const PROVIDER_REGIONS: readonly string[] = Object.values(aws.Region);

function isProviderRegion(region: string): region is aws.Region {
    return PROVIDER_REGIONS.includes(region);
}

/**
 * The region as the AWS provider types it, or undefined when the provider does not know it
 */
export function providerRegion(region: string): aws.Region | undefined {
    return isProviderRegion(region) ? region : undefined;
}

/**
 * Full service name for a VPC endpoint
 * @param service service suffix, e.g. "s3" or "ecr.api"
 */
export function endpointServiceName(region: string, service: string): string {
    return `com.amazonaws.${region}.${service}`;
}

/**
 * Pick the first `count` zones from the names AWS reports as available.
 * The list is sorted so the pick does not depend on API ordering.
 */
export function selectAvailabilityZones(available: readonly string[], count: number, region: string): string[] {
    const names = [...available].sort();
    if (names.length < count) {
        throw new Error(
            `Region ${region} has ${names.length} available zone(s) but ${count} were requested`
        );
    }
    return names.slice(0, count);
}
