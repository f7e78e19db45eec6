import { Node } from 'constructs';

import {
  ANY_IPV4_CIDR,
  DEFAULT_AVAILABILITY_ZONE_SUFFIXES,
  DEFAULT_KEY_PAIR_NAME,
  DEFAULT_NAT_INSTANCE_AMI_ID,
  DEFAULT_VPC_CIDR,
  Ec2Topology,
  VpcLayout,
} from '../constants/Common';
import { SubnetDefinition } from '../model/Vpc';

/**
 * Settings of the whole network application, read from the CDK context
 *
 * @see https://docs.aws.amazon.com/cdk/v2/guide/context.html
 */
interface NetworkConfig {
  /**
   * Target account, unset for environment agnostic stacks
   */
  account?: string;
  region: string;
  vpcStackName: string;
  /**
   * Must differ from `vpcStackName`, export names are prefixed with the VPC stack name
   */
  ec2StackName: string;
  /**
   * `public-private` for the routed VPC, `public-only` for public subnets without NAT
   */
  vpcLayout: VpcLayout;
  vpcName: string;
  /**
   * IPv4 /16 block, split in /24 subnets
   */
  vpcCidr: string;
  /**
   * Availability zones as single letter suffixes of the region, e.g. `['a', 'b']`
   */
  availabilityZoneSuffixes: string[];
  /**
   * Instances declared by the EC2 stack, `none` skips the stack
   */
  ec2Topology: Ec2Topology;
  keyPairName: string;
  /**
   * Image of the NAT instance, the other instances run the latest Amazon Linux 2
   */
  natInstanceAmiId: string;
  /**
   * Source CIDR allowed to reach the public instances on SSH
   */
  sshIngressCidr: string;
  /**
   * Whether templates check the bootstrap stack version, off by default
   */
  generateBootstrapVersionRule: boolean;
}

const IPV4_CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

/**
 * Reads the network configuration from the context of the given construct node
 *
 * @param node Node of the App (or any construct) holding the context
 * @param environment Process environment, used for the CDK CLI default account and region
 * @returns Validated configuration
 */
function loadNetworkConfig(node: Node, environment: NodeJS.ProcessEnv = process.env): NetworkConfig {
  const config: NetworkConfig = {
    account: environment.CDK_DEFAULT_ACCOUNT,
    region: getString(node, 'region', environment.CDK_DEFAULT_REGION ?? 'us-east-1'),
    vpcStackName: getString(node, 'vpcStackName', 'NetworkVpcStack'),
    ec2StackName: getString(node, 'ec2StackName', 'NetworkEc2Stack'),
    vpcLayout: getEnumValue<VpcLayout>(node, 'vpcLayout', VpcLayout, VpcLayout.PUBLIC_PRIVATE),
    vpcName: getString(node, 'vpcName', 'NetworkVpc'),
    vpcCidr: getString(node, 'vpcCidr', DEFAULT_VPC_CIDR),
    availabilityZoneSuffixes: getStringList(node, 'availabilityZoneSuffixes', DEFAULT_AVAILABILITY_ZONE_SUFFIXES),
    ec2Topology: getEnumValue<Ec2Topology>(node, 'ec2Topology', Ec2Topology, Ec2Topology.BASTION_NAT_INSTANCE),
    keyPairName: getString(node, 'keyPairName', DEFAULT_KEY_PAIR_NAME),
    natInstanceAmiId: getString(node, 'natInstanceAmiId', DEFAULT_NAT_INSTANCE_AMI_ID),
    sshIngressCidr: getString(node, 'sshIngressCidr', ANY_IPV4_CIDR),
    generateBootstrapVersionRule: getBoolean(node, 'generateBootstrapVersionRule', false),
  };
  validateNetworkConfig(config);

  return config;
}

/**
 * Checks the relations between configuration values that can not be checked one by one
 */
function validateNetworkConfig(config: NetworkConfig): void {
  if (config.vpcStackName === config.ec2StackName) {
    throw new Error(`Context values 'vpcStackName' and 'ec2StackName' must differ, both are '${config.vpcStackName}'`);
  }
  if (!isSlashSixteenCidr(config.vpcCidr)) {
    throw new Error(`Context value 'vpcCidr' must be an IPv4 /16 block such as '10.0.0.0/16', got '${config.vpcCidr}'`);
  }
  if (!isIpv4Cidr(config.sshIngressCidr)) {
    throw new Error(`Context value 'sshIngressCidr' must be an IPv4 CIDR block, got '${config.sshIngressCidr}'`);
  }
  if (!/^ami-[0-9a-f]+$/.test(config.natInstanceAmiId)) {
    throw new Error(`Context value 'natInstanceAmiId' must be an AMI ID, got '${config.natInstanceAmiId}'`);
  }

  const suffixes = config.availabilityZoneSuffixes;
  if (suffixes.length === 0) {
    throw new Error(`Context value 'availabilityZoneSuffixes' must name at least one availability zone`);
  }
  suffixes.forEach((suffix: string) => {
    if (!/^[a-z]$/.test(suffix)) {
      throw new Error(`Context value 'availabilityZoneSuffixes' must hold single lowercase letters, got '${suffix}'`);
    }
  });
  if (new Set(suffixes).size !== suffixes.length) {
    throw new Error(`Context value 'availabilityZoneSuffixes' must not repeat a zone, got '${suffixes.join(',')}'`);
  }

  if (config.vpcLayout === VpcLayout.PUBLIC_ONLY
    && config.ec2Topology !== Ec2Topology.NONE
    && config.ec2Topology !== Ec2Topology.SINGLE_INSTANCE) {
    throw new Error(`EC2 topology '${config.ec2Topology}' needs private subnets, `
      + `which the '${VpcLayout.PUBLIC_ONLY}' VPC layout does not declare`);
  }
  if (config.ec2Topology === Ec2Topology.BASTION_NAT_GATEWAY && suffixes.length < 2) {
    throw new Error(`EC2 topology '${Ec2Topology.BASTION_NAT_GATEWAY}' needs at least two availability zones`);
  }
}

/**
 * Lays out one public and one private /24 subnet per availability zone inside a /16 VPC
 *
 * @example 10.0.0.0/16, ['a', 'b'] -> public 10.0.1.0/24, 10.0.2.0/24 and private 10.0.3.0/24, 10.0.4.0/24
 *
 * @param vpcCidr VPC CIDR block, must be a /16
 * @param availabilityZoneSuffixes Availability zone suffixes in the order subnets are numbered
 * @returns Public subnets first, then private subnets, both in availability zone order
 */
function planSubnets(vpcCidr: string, availabilityZoneSuffixes: string[]): SubnetDefinition[] {
  const match = IPV4_CIDR_PATTERN.exec(vpcCidr);
  if (match === null || !isSlashSixteenCidr(vpcCidr)) {
    throw new Error(`Cannot lay out subnets in '${vpcCidr}', a /16 block is required`);
  }
  const prefix = `${match[1]}.${match[2]}`;
  const count = availabilityZoneSuffixes.length;

  const publicSubnets = availabilityZoneSuffixes.map((suffix: string, index: number): SubnetDefinition => ({
    tier: 'public',
    availabilityZoneSuffix: suffix,
    cidrBlock: `${prefix}.${index + 1}.0/24`,
  }));
  const privateSubnets = availabilityZoneSuffixes.map((suffix: string, index: number): SubnetDefinition => ({
    tier: 'private',
    availabilityZoneSuffix: suffix,
    cidrBlock: `${prefix}.${count + index + 1}.0/24`,
  }));

  return [...publicSubnets, ...privateSubnets];
}

function isIpv4Cidr(value: string): boolean {
  const match = IPV4_CIDR_PATTERN.exec(value);
  if (match === null) {
    return false;
  }
  const octets = match.slice(1, 5).map(Number);

  return octets.every((octet: number) => octet <= 255) && Number(match[5]) <= 32;
}

function isSlashSixteenCidr(value: string): boolean {
  return isIpv4Cidr(value) && value.endsWith('.0.0/16');
}

function getString(node: Node, key: string, defaultValue: string): string {
  const value: unknown = node.tryGetContext(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Context value '${key}' must be a non empty string, got '${String(value)}'`);
  }

  return value.trim();
}

/**
 * Accepts both a JSON list (cdk.json) and a comma separated string (`-c key=a,b`)
 */
function getStringList(node: Node, key: string, defaultValue: string[]): string[] {
  const value: unknown = node.tryGetContext(key);
  if (value === undefined) {
    return [...defaultValue];
  }
  if (typeof value === 'string') {
    return value.split(',').map((item: string) => item.trim()).filter((item: string) => item !== '');
  }
  if (Array.isArray(value) && value.every((item: unknown) => typeof item === 'string')) {
    return value.map((item: string) => item.trim());
  }

  throw new Error(`Context value '${key}' must be a list of strings, got '${JSON.stringify(value)}'`);
}

function getBoolean(node: Node, key: string, defaultValue: boolean): boolean {
  const value: unknown = node.tryGetContext(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }

  throw new Error(`Context value '${key}' must be a boolean, got '${String(value)}'`);
}

function getEnumValue<T extends string>(
  node: Node,
  key: string,
  enumeration: Record<string, T>,
  defaultValue: T,
): T {
  const raw = getString(node, key, defaultValue);
  const allowed = Object.values(enumeration);
  const found = allowed.find((candidate: T) => candidate === raw);
  if (found === undefined) {
    throw new Error(`Context value '${key}' must be one of '${allowed.join("', '")}', got '${raw}'`);
  }

  return found;
}

export {
  NetworkConfig,
  loadNetworkConfig,
  planSubnets,
}
