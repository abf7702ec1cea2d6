import * as fs from 'fs';
import * as pulumi from '@pulumi/pulumi';
import * as yaml from 'js-yaml';
import { VPCComponentArgs, VPCEndpointOptions } from '../components/aws/vpc';
import { GATEWAY_ENDPOINT_SERVICES, GatewayEndpointService } from '../components/aws/vpc-endpoints';
import { NatGatewayStrategy, SubnetTierSpec } from '../components/shared/interfaces';
import { Tags } from '../components/shared/utils/aws-helpers';
import { ConfigurationError } from '../components/shared/utils/error-handling';
import { LogLevelName } from '../components/shared/utils/logging';
import { BOOLEAN_KEYS, NetworkConfig, NUMBER_KEYS, OBJECT_KEYS, STRING_KEYS } from './types';

type RawObject = { [key: string]: unknown };

const COMPONENT = 'ConfigManager';
const NAT_STRATEGIES: readonly NatGatewayStrategy[] = ['zonal', 'single'];
const TENANCIES = ['default', 'dedicated'] as const;
const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

const TOP_LEVEL_KEYS: readonly string[] = [...STRING_KEYS, ...NUMBER_KEYS, ...BOOLEAN_KEYS, ...OBJECT_KEYS];
const SUBNET_TIER_KEYS = ['cidrBlocks', 'subnetPrefix', 'tags', 'routeTableTags'] as const;
const ENDPOINT_KEYS = [
    'gatewayServices',
    'interfaceServices',
    'attachToPublicRouteTables',
    'privateDnsEnabled',
    'allowedCidrBlocks',
    'tags'
] as const;
const LOGGING_KEYS = ['logLevel'] as const;

function isRecord(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Message of a thrown value; errors from another realm fail `instanceof Error`
 */
function messageOf(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

/**
 * Narrows an untyped document, failing with the path of the first bad value
 */
class DocumentReader {
    constructor(private readonly source: string) {}

    public error(path: string, message: string): ConfigurationError {
        return new ConfigurationError(COMPONENT, this.source, path, message);
    }

    public object(value: unknown, path: string): RawObject {
        if (!isRecord(value)) {
            throw this.error(path, `expected a mapping, got ${describe(value)}`);
        }
        return value;
    }

    /**
     * Reject keys outside `allowed`
     */
    public allowOnly(obj: RawObject, allowed: readonly string[], path: string): void {
        const unknown = Object.keys(obj).find(key => !allowed.includes(key));
        if (unknown !== undefined) {
            throw this.error(`${path}${unknown}`, 'is not a recognised setting');
        }
    }

    public string(obj: RawObject, key: string, path: string): string | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value !== 'string' || value.length === 0) {
            throw this.error(`${path}${key}`, `expected a non-empty string, got ${describe(value)}`);
        }
        return value;
    }

    public requiredString(obj: RawObject, key: string, path: string): string {
        const value = this.string(obj, key, path);
        if (value === undefined) {
            throw this.error(`${path}${key}`, 'is required');
        }
        return value;
    }

    public oneOf<T extends string>(obj: RawObject, key: string, path: string, allowed: readonly T[]): T | undefined {
        const value = this.string(obj, key, path);
        if (value === undefined) {
            return undefined;
        }
        const match = allowed.find(candidate => candidate === value);
        if (match === undefined) {
            throw this.error(`${path}${key}`, `expected one of ${allowed.join(', ')}, got '${value}'`);
        }
        return match;
    }

    public integer(obj: RawObject, key: string, path: string): number | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value !== 'number' || !Number.isInteger(value)) {
            throw this.error(`${path}${key}`, `expected an integer, got ${describe(value)}`);
        }
        return value;
    }

    public boolean(obj: RawObject, key: string, path: string): boolean | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (typeof value !== 'boolean') {
            throw this.error(`${path}${key}`, `expected true or false, got ${describe(value)}`);
        }
        return value;
    }

    public stringList(obj: RawObject, key: string, path: string): string[] | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        if (!Array.isArray(value)) {
            throw this.error(`${path}${key}`, `expected a list, got ${describe(value)}`);
        }
        const items: unknown[] = value;
        return items.map((item, index) => {
            if (typeof item !== 'string' || item.length === 0) {
                throw this.error(`${path}${key}[${index}]`, `expected a non-empty string, got ${describe(item)}`);
            }
            return item;
        });
    }

    public tags(obj: RawObject, key: string, path: string): Tags | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        const raw = this.object(value, `${path}${key}`);
        const tags: Tags = {};
        for (const [tagKey, tagValue] of Object.entries(raw)) {
            // YAML turns bare numbers and booleans into non-strings; tags are strings
            if (typeof tagValue === 'string' || typeof tagValue === 'number' || typeof tagValue === 'boolean') {
                tags[tagKey] = String(tagValue);
            } else {
                throw this.error(`${path}${key}.${tagKey}`, `expected a scalar tag value, got ${describe(tagValue)}`);
            }
        }
        return tags;
    }

    public subnetTier(obj: RawObject, key: string): SubnetTierSpec | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        const path = `${key}.`;
        const raw = this.object(value, key);
        this.allowOnly(raw, SUBNET_TIER_KEYS, path);
        return {
            cidrBlocks: this.stringList(raw, 'cidrBlocks', path),
            subnetPrefix: this.integer(raw, 'subnetPrefix', path),
            tags: this.tags(raw, 'tags', path),
            routeTableTags: this.tags(raw, 'routeTableTags', path)
        };
    }

    public endpoints(obj: RawObject, key: string): VPCEndpointOptions | undefined {
        const value = obj[key];
        if (value === undefined || value === null) {
            return undefined;
        }
        const path = `${key}.`;
        const raw = this.object(value, key);
        this.allowOnly(raw, ENDPOINT_KEYS, path);
        const gatewayServices = this.stringList(raw, 'gatewayServices', path)?.map((service, index): GatewayEndpointService => {
            const match = GATEWAY_ENDPOINT_SERVICES.find(candidate => candidate === service);
            if (match === undefined) {
                throw this.error(`${path}gatewayServices[${index}]`, `expected one of ${GATEWAY_ENDPOINT_SERVICES.join(', ')}, got '${service}'`);
            }
            return match;
        });

        return {
            gatewayServices,
            interfaceServices: this.stringList(raw, 'interfaceServices', path),
            attachToPublicRouteTables: this.boolean(raw, 'attachToPublicRouteTables', path),
            privateDnsEnabled: this.boolean(raw, 'privateDnsEnabled', path),
            allowedCidrBlocks: this.stringList(raw, 'allowedCidrBlocks', path),
            tags: this.tags(raw, 'tags', path)
        };
    }
}

function describe(value: unknown): string {
    if (Array.isArray(value)) {
        return 'a list';
    }
    if (value === null) {
        return 'null';
    }
    return typeof value === 'object' ? 'a mapping' : `${typeof value} (${String(value)})`;
}

/**
 * Configuration management for network descriptions
 */
export class ConfigManager {
    /**
     * Load a network configuration from a YAML file
     * @param configPath Path to the configuration file
     */
    public static loadConfig(configPath: string): NetworkConfig {
        let content: string;
        try {
            content = fs.readFileSync(configPath, 'utf8');
        } catch (error) {
            throw new ConfigurationError(COMPONENT, configPath, '.', `cannot read file: ${messageOf(error)}`);
        }

        content = this.substituteEnvironmentVariables(content, configPath);

        let document: unknown;
        try {
            document = yaml.load(content);
        } catch (error) {
            throw new ConfigurationError(COMPONENT, configPath, '.', `invalid YAML: ${messageOf(error)}`);
        }

        return this.fromObject(document, configPath);
    }

    /**
     * Read the network configuration from stack configuration
     * @param config the `network` namespace
     * @param awsConfig the `aws` namespace, consulted for the region
     */
    public static fromPulumiConfig(config: pulumi.Config, awsConfig?: pulumi.Config): NetworkConfig {
        const raw: RawObject = {};

        for (const key of STRING_KEYS) {
            raw[key] = config.get(key);
        }
        for (const key of NUMBER_KEYS) {
            raw[key] = config.getNumber(key);
        }
        for (const key of BOOLEAN_KEYS) {
            raw[key] = config.getBoolean(key);
        }
        for (const key of OBJECT_KEYS) {
            raw[key] = config.getObject<unknown>(key);
        }

        raw.name = raw.name ?? `${pulumi.getProject()}-${pulumi.getStack()}`;
        raw.region = raw.region ?? awsConfig?.get('region');

        return this.fromObject(raw, `${config.name} stack configuration`);
    }

    /**
     * Narrow an untyped document into a network configuration
     * @param source where the document came from, for error messages
     */
    public static fromObject(document: unknown, source: string): NetworkConfig {
        const reader = new DocumentReader(source);
        const raw = reader.object(document, '.');
        reader.allowOnly(raw, TOP_LEVEL_KEYS, '');

        let logging: NetworkConfig['logging'];
        if (raw.logging !== undefined && raw.logging !== null) {
            const rawLogging = reader.object(raw.logging, 'logging');
            reader.allowOnly(rawLogging, LOGGING_KEYS, 'logging.');
            logging = { logLevel: reader.oneOf(rawLogging, 'logLevel', 'logging.', LOG_LEVELS) };
        }

        const config: NetworkConfig = {
            name: reader.requiredString(raw, 'name', ''),
            region: reader.requiredString(raw, 'region', ''),
            cidrBlock: reader.requiredString(raw, 'cidrBlock', ''),
            availabilityZones: reader.stringList(raw, 'availabilityZones', ''),
            availabilityZoneCount: reader.integer(raw, 'availabilityZoneCount', ''),
            publicSubnets: reader.subnetTier(raw, 'publicSubnets'),
            privateSubnets: reader.subnetTier(raw, 'privateSubnets'),
            enableDnsHostnames: reader.boolean(raw, 'enableDnsHostnames', ''),
            enableDnsSupport: reader.boolean(raw, 'enableDnsSupport', ''),
            instanceTenancy: reader.oneOf(raw, 'instanceTenancy', '', TENANCIES),
            mapPublicIpOnLaunch: reader.boolean(raw, 'mapPublicIpOnLaunch', ''),
            internetGatewayEnabled: reader.boolean(raw, 'internetGatewayEnabled', ''),
            natGatewayEnabled: reader.boolean(raw, 'natGatewayEnabled', ''),
            natGatewayStrategy: reader.oneOf(raw, 'natGatewayStrategy', '', NAT_STRATEGIES),
            endpoints: reader.endpoints(raw, 'endpoints'),
            tags: reader.tags(raw, 'tags', ''),
            vpcTags: reader.tags(raw, 'vpcTags', ''),
            internetGatewayTags: reader.tags(raw, 'internetGatewayTags', ''),
            natGatewayTags: reader.tags(raw, 'natGatewayTags', ''),
            logging
        };

        if (config.natGatewayStrategy && !config.natGatewayEnabled) {
            throw reader.error('natGatewayStrategy', 'is set but natGatewayEnabled is not true');
        }

        return config;
    }

    /**
     * Component arguments for a network configuration
     */
    public static toComponentArgs(config: NetworkConfig): VPCComponentArgs {
        const { name: _name, ...args } = config;
        return args;
    }

    /**
     * Substitute ${VAR} and ${VAR:-default} references
     */
    public static substituteEnvironmentVariables(content: string, source = 'inline'): string {
        return content.replace(/\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g, (_match, varName: string, fallback?: string) => {
            const value = process.env[varName];
            if (value !== undefined && value !== '') {
                return value;
            }
            if (fallback !== undefined) {
                return fallback;
            }
            throw new ConfigurationError(COMPONENT, source, `\${${varName}}`, `environment variable ${varName} is not defined`);
        });
    }
}
