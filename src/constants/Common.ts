import * as ec2 from 'aws-cdk-lib/aws-ec2';

/**
 * Destination used for default (internet) routes
 */
const ANY_IPV4_CIDR = '0.0.0.0/0';

/**
 * Default VPC CIDR block, subnets are carved from it as /24 blocks
 */
const DEFAULT_VPC_CIDR = '10.0.0.0/16';

/**
 * Availability zone suffixes appended to the region name, one public and one private subnet per suffix
 */
const DEFAULT_AVAILABILITY_ZONE_SUFFIXES = ['a', 'b'];

/**
 * Amazon Linux 2 AMI (HVM) - Kernel 5.10, SSD Volume Type in us-east-1, used by the NAT instance
 */
const DEFAULT_NAT_INSTANCE_AMI_ID = 'ami-0c02fb55956c7d316';

const DEFAULT_KEY_PAIR_NAME = 'network-key-pair';

/**
 * Instance type shared by every instance of the EC2 stack
 */
const INSTANCE_TYPE = ec2.InstanceType.of(ec2.InstanceClass.T2, ec2.InstanceSize.MICRO).toString();

const SSH_PORT = 22;

/**
 * Names of the values exported by the VPC stacks
 *
 * @remarks the export name is always `{StackName}-{key}`
 */
enum VpcExport {
  VPC_ID = 'VpcId',
  VPC_CIDR_BLOCK = 'VpcCidrBlock',
  PUBLIC_SUBNET_IDS = 'PublicSubnetIds',
  PRIVATE_SUBNET_IDS = 'PrivateSubnetIds',
  PRIVATE_ROUTE_TABLE_IDS = 'PrivateRouteTableIds',
}

/**
 * Shape of the VPC stack
 */
enum VpcLayout {
  /** Routed VPC declared with L1 constructs: public and private subnets, IGW and route tables */
  PUBLIC_PRIVATE = 'public-private',
  /** L2 VPC with public subnets only and no NAT */
  PUBLIC_ONLY = 'public-only',
}

/**
 * Fixed sets of instances and gateways the EC2 stack can declare
 */
enum Ec2Topology {
  NONE = 'none',
  SINGLE_INSTANCE = 'single-instance',
  BASTION_NAT_INSTANCE = 'bastion-nat-instance',
  BASTION_NAT_GATEWAY = 'bastion-nat-gateway',
}

export {
  ANY_IPV4_CIDR,
  DEFAULT_AVAILABILITY_ZONE_SUFFIXES,
  DEFAULT_KEY_PAIR_NAME,
  DEFAULT_NAT_INSTANCE_AMI_ID,
  DEFAULT_VPC_CIDR,
  Ec2Topology,
  INSTANCE_TYPE,
  SSH_PORT,
  VpcExport,
  VpcLayout,
}
