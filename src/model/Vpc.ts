type SubnetTier = 'public' | 'private';

/**
 * Subnet to be declared by the routed VPC stack
 */
interface SubnetDefinition {
  tier: SubnetTier;
  /**
   * Letter appended to the region to build the availability zone name
   *
   * @example 'a' -> us-east-1a
   */
  availabilityZoneSuffix: string;
  cidrBlock: string;
}

/**
 * VPC availability zones configuration as seen from a stack importing the VPC exports,
 * used to map public/private subnets with their private route table
 */
interface AzConfiguration {
  /**
   * Name of the Availability Zone
   *
   * @see https://aws.amazon.com/about-aws/global-infrastructure/regions_az/
   */
  availabilityZone: string;
  /**
   * Public subnet ID used in this AZ
   */
  publicSubnetId: string;
  /**
   * Private subnet ID used in this AZ, absent when the VPC has no private subnets
   */
  privateSubnetId?: string;
  /**
   * Private route table ID used in this AZ, absent when the VPC has no private subnets
   */
  privateRouteTableId?: string;
}

/**
 * Values imported from a VPC stack
 */
interface ImportedNetwork {
  vpcId: string;
  vpcCidrBlock: string;
  azConfigurations: AzConfiguration[];
}

/**
 * Values a VPC stack publishes for dependent stacks, subnet lists are ordered by availability zone
 */
interface NetworkExports {
  vpcId: string;
  vpcCidrBlock: string;
  publicSubnetIds: string[];
  privateSubnetIds?: string[];
  privateRouteTableIds?: string[];
}

export {
  AzConfiguration,
  ImportedNetwork,
  NetworkExports,
  SubnetDefinition,
  SubnetTier,
}
