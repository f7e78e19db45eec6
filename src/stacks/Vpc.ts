import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { planSubnets } from '../config/NetworkConfig';
import { ANY_IPV4_CIDR } from '../constants/Common';
import { CrossStackReferences } from '../constructs/CrossStackReferences';
import { SubnetDefinition } from '../model/Vpc';

interface VpcStackProps extends cdk.StackProps {
  vpcName: string;
  vpcCidr: string;
  /**
   * Availability zones to spread subnets across, as suffixes of the stack region
   */
  availabilityZoneSuffixes: string[];
}

/**
 * Routed VPC stack declared with L1 constructs: public subnets behind an Internet Gateway and private subnets
 * with one route table per AZ
 *
 * Private route tables are created without default route, dependent stacks add it towards their NAT devices
 * using the exported route table IDs
 */
class VpcStack extends cdk.Stack {
  public readonly vpc: ec2.CfnVPC;
  public readonly publicSubnets: ec2.CfnSubnet[];
  public readonly privateSubnets: ec2.CfnSubnet[];
  public readonly privateRouteTables: ec2.CfnRouteTable[];

  constructor(scope: Construct, id: string, props: VpcStackProps) {
    super(scope, id, props);

    this.vpc = new ec2.CfnVPC(this, 'Vpc', {
      cidrBlock: props.vpcCidr,
      enableDnsHostnames: true,
      enableDnsSupport: true,
      instanceTenancy: 'default',
      tags: [{ key: 'Name', value: props.vpcName }],
    });

    const internetGateway = new ec2.CfnInternetGateway(this, 'InternetGateway', {
      tags: [{ key: 'Name', value: `${props.vpcName}-igw` }],
    });
    const gatewayAttachment = new ec2.CfnVPCGatewayAttachment(this, 'InternetGatewayAttachment', {
      vpcId: this.vpc.ref,
      internetGatewayId: internetGateway.ref,
    });

    const subnetDefinitions = planSubnets(props.vpcCidr, props.availabilityZoneSuffixes);
    this.publicSubnets = subnetDefinitions
      .filter((definition: SubnetDefinition) => definition.tier === 'public')
      .map((definition: SubnetDefinition) => this.createSubnet(definition));
    this.privateSubnets = subnetDefinitions
      .filter((definition: SubnetDefinition) => definition.tier === 'private')
      .map((definition: SubnetDefinition) => this.createSubnet(definition));

    // A single public route table shared by every public subnet
    const publicRouteTable = new ec2.CfnRouteTable(this, 'PublicRouteTable', {
      vpcId: this.vpc.ref,
      tags: [{ key: 'Name', value: 'Public Route Table' }],
    });
    const publicRoute = new ec2.CfnRoute(this, 'PublicRoute', {
      routeTableId: publicRouteTable.ref,
      destinationCidrBlock: ANY_IPV4_CIDR,
      gatewayId: internetGateway.ref,
    });
    // The route can not be created until the gateway is attached to the VPC
    publicRoute.addDependency(gatewayAttachment);

    this.publicSubnets.forEach((subnet: ec2.CfnSubnet, index: number) => {
      const suffix = VpcStack.getSubnetIdSuffix(props.availabilityZoneSuffixes[index]);
      new ec2.CfnSubnetRouteTableAssociation(this, `PublicSubnet${suffix}RouteTableAssociation`, {
        subnetId: subnet.ref,
        routeTableId: publicRouteTable.ref,
      });
    });

    // One private route table per AZ
    this.privateRouteTables = this.privateSubnets.map((subnet: ec2.CfnSubnet, index: number) => {
      const suffix = VpcStack.getSubnetIdSuffix(props.availabilityZoneSuffixes[index]);
      const routeTable = new ec2.CfnRouteTable(this, `PrivateRouteTable${suffix}`, {
        vpcId: this.vpc.ref,
        tags: [{ key: 'Name', value: `Private Route Table ${suffix}` }],
      });
      new ec2.CfnSubnetRouteTableAssociation(this, `PrivateSubnet${suffix}RouteTableAssociation`, {
        subnetId: subnet.ref,
        routeTableId: routeTable.ref,
      });

      return routeTable;
    });

    CrossStackReferences.exportNetwork(this, {
      vpcId: this.vpc.ref,
      vpcCidrBlock: this.vpc.attrCidrBlock,
      publicSubnetIds: this.publicSubnets.map((subnet: ec2.CfnSubnet) => subnet.ref),
      privateSubnetIds: this.privateSubnets.map((subnet: ec2.CfnSubnet) => subnet.ref),
      privateRouteTableIds: this.privateRouteTables.map((routeTable: ec2.CfnRouteTable) => routeTable.ref),
    });
  }

  private createSubnet(definition: SubnetDefinition): ec2.CfnSubnet {
    const isPublic = definition.tier === 'public';
    const tierName = isPublic ? 'Public' : 'Private';
    const suffix = VpcStack.getSubnetIdSuffix(definition.availabilityZoneSuffix);

    return new ec2.CfnSubnet(this, `${tierName}Subnet${suffix}`, {
      vpcId: this.vpc.ref,
      availabilityZone: `${this.region}${definition.availabilityZoneSuffix}`,
      cidrBlock: definition.cidrBlock,
      mapPublicIpOnLaunch: isPublic,
      tags: [{ key: 'Name', value: `${tierName} Subnet ${suffix}` }],
    });
  }

  /**
   * Utility method that turns an availability zone suffix into the suffix used by construct IDs
   *
   * @example a -> A
   */
  public static getSubnetIdSuffix(availabilityZoneSuffix: string): string {
    return availabilityZoneSuffix.toUpperCase();
  }
}

export {
  VpcStack,
  VpcStackProps,
}
