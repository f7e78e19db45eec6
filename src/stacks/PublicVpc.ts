import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { CrossStackReferences } from '../constructs/CrossStackReferences';

interface PublicVpcStackProps extends cdk.StackProps {
  vpcName: string;
  vpcCidr: string;
  availabilityZoneSuffixes: string[];
}

/**
 * Vpc basic stack: public subnets only, no NAT
 */
class PublicVpcStack extends cdk.Stack {
  public readonly vpc: ec2.Vpc;

  constructor(scope: Construct, id: string, props: PublicVpcStackProps) {
    super(scope, id, props);

    this.vpc = new ec2.Vpc(this, 'Vpc', {
      vpcName: props.vpcName,
      availabilityZones: props.availabilityZoneSuffixes.map((suffix: string) => `${this.region}${suffix}`),
      ipAddresses: ec2.IpAddresses.cidr(props.vpcCidr),
      natGateways: 0,
      subnetConfiguration: [{
        name: 'Public',
        subnetType: ec2.SubnetType.PUBLIC,
        cidrMask: 24,
      }],
      enableDnsHostnames: false,
      enableDnsSupport: true,
      restrictDefaultSecurityGroup: false,
    });
    cdk.Tags.of(this).add('Name', props.vpcName);

    CrossStackReferences.exportNetwork(this, {
      vpcId: this.vpc.vpcId,
      vpcCidrBlock: this.vpc.vpcCidrBlock,
      publicSubnetIds: this.vpc.publicSubnets.map((subnet: ec2.ISubnet) => subnet.subnetId),
    });
  }
}

export {
  PublicVpcStack,
  PublicVpcStackProps,
}
