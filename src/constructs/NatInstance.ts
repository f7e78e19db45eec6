import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import { readFileSync } from 'fs';
import { join } from 'path';

import { ANY_IPV4_CIDR } from '../constants/Common';
import { Instances } from './Instances';
import { SecurityGroups } from './SecurityGroups';

/**
 * Location of the script that turns a plain Amazon Linux 2 instance into a NAT instance
 */
const ENABLE_NAT_SCRIPT_PATH = join(__dirname, 'user-data', 'enable-nat.sh');

interface NatInstanceProps {
  vpcId: string;
  vpcCidrBlock: string;
  /**
   * Public subnet where the instance is placed
   */
  subnetId: string;
  imageId: string;
  keyName: string;
  sshIngressCidr: string;
}

/**
 * Construct to create a self-managed NAT instance with its dedicated security group
 */
class NatInstance extends Construct {
  public readonly securityGroup: ec2.CfnSecurityGroup;
  public readonly instance: ec2.CfnInstance;

  constructor(scope: Construct, id: string, props: NatInstanceProps) {
    super(scope, id);

    this.securityGroup = SecurityGroups.createNatInstanceSecurityGroup(
      this,
      'SecurityGroup',
      props.vpcId,
      props.vpcCidrBlock,
      props.sshIngressCidr,
    );
    this.instance = Instances.createInstance(this, id, {
      imageId: props.imageId,
      keyName: props.keyName,
      subnetId: props.subnetId,
      securityGroup: this.securityGroup,
      associatePublicIpAddress: true,
      // Forwarded packets are neither sourced from nor addressed to the instance
      sourceDestCheck: false,
      userData: cdk.Fn.base64(NatInstance.readEnableNatScript()),
    });
  }

  /**
   * Sends the internet traffic of a route table through this instance
   *
   * @param id ID of the route construct
   * @param routeTableId Route table to add the default route to
   * @returns Route construct
   */
  public addDefaultRoute(id: string, routeTableId: string): ec2.CfnRoute {
    return new ec2.CfnRoute(this, id, {
      routeTableId,
      destinationCidrBlock: ANY_IPV4_CIDR,
      instanceId: this.instance.ref,
    });
  }

  public static readEnableNatScript(): string {
    return readFileSync(ENABLE_NAT_SCRIPT_PATH).toString();
  }
}

export {
  NatInstance,
  NatInstanceProps,
}
