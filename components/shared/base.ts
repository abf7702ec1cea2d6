import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";
import { ComponentLogger, LogLevelName, parseLogLevel } from "./utils/logging";
import { ValidationError, ValidationUtils } from "./utils/error-handling";
import { mergeTagLayers, providerRegion, Tags } from "./utils/aws-helpers";

export const DEFAULT_REGION = "us-east-1";

/**
 * Base arguments interface that all component arguments should extend
 */
export interface BaseComponentArgs {
    region?: string;
    tags?: Tags;
    logging?: {
        logLevel?: LogLevelName;
    };
}

/**
 * Base AWS component class that provides common functionality
 * All AWS infrastructure components should extend this class
 */
export abstract class BaseAWSComponent extends pulumi.ComponentResource {
    protected readonly componentType: string;
    protected readonly componentName: string;
    protected readonly region: string;
    protected readonly tags: Tags;
    protected readonly logger: ComponentLogger;

    constructor(
        type: string,
        name: string,
        args: BaseComponentArgs,
        opts?: pulumi.ComponentResourceOptions
    ) {
        super(type, name, {}, opts);

        this.componentType = type;
        this.componentName = name;
        this.logger = new ComponentLogger(type, name, {
            region: args.region,
            stackName: pulumi.getStack()
        }, { minLevel: parseLogLevel(args.logging?.logLevel) });

        try {
            this.region = args.region ?? DEFAULT_REGION;
            ValidationUtils.validateRegion(this.region, type, name);

            this.tags = mergeTagLayers({
                ManagedBy: "Pulumi",
                Component: type,
                Project: pulumi.getProject(),
                Stack: pulumi.getStack()
            }, args.tags);
            ValidationUtils.validateTags(this.tags, type, name);
        } catch (error) {
            this.logger.validationFailure("component-arguments", error instanceof Error ? error : new Error(String(error)));
            throw error;
        }

        this.logger.debug("Component initialized", {
            region: this.region,
            tagCount: Object.keys(this.tags).length
        });
    }

    /**
     * Create an explicit AWS provider for the given region
     */
    protected createProvider(region: string): aws.Provider {
        const knownRegion = providerRegion(region);
        if (!knownRegion) {
            throw new ValidationError(this.componentType, this.componentName, "region", region, "a region known to the AWS provider");
        }
        this.logger.debug("Creating AWS provider", { region });

        return new aws.Provider(`${this.componentName}-provider-${region}`, {
            region: knownRegion
        }, { parent: this });
    }

    /**
     * Use the caller's provider when one was passed, otherwise create one for the region
     */
    protected resolveProvider(opts: pulumi.ComponentResourceOptions | undefined, region: string): pulumi.ProviderResource {
        return opts?.provider ?? this.createProvider(region);
    }

    /**
     * Layer resource tags over the component tags; later layers win.
     * The merged set is checked against the AWS tag limits.
     */
    protected mergeTags(...resourceTags: (Tags | undefined)[]): Tags {
        const merged = mergeTagLayers(this.tags, ...resourceTags);
        ValidationUtils.validateTags(merged, this.componentType, this.componentName);
        return merged;
    }

    /**
     * Standard options for a child resource
     */
    protected childOptions(provider: pulumi.ProviderResource, extra?: pulumi.CustomResourceOptions): pulumi.CustomResourceOptions {
        return { parent: this, provider, ...extra };
    }
}
