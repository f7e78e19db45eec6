import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { ANY_IPV4_CIDR } from '../constants/Common';

interface NatGatewayProps {
  /**
   * Public subnet where the gateway is placed
   */
  subnetId: string;
}

/**
 * Construct to create a managed NAT Gateway with its own Elastic IP
 */
class NatGateway extends Construct {
  public readonly elasticIp: ec2.CfnEIP;
  public readonly natGateway: ec2.CfnNatGateway;

  constructor(scope: Construct, id: string, props: NatGatewayProps) {
    super(scope, id);

    this.elasticIp = new ec2.CfnEIP(this, 'ElasticIp', {
      domain: 'vpc',
      tags: [{ key: 'Name', value: `${id}ElasticIp` }],
    });
    this.natGateway = new ec2.CfnNatGateway(this, id, {
      allocationId: this.elasticIp.attrAllocationId,
      subnetId: props.subnetId,
      tags: [{ key: 'Name', value: id }],
    });
  }

  /**
   * Sends the internet traffic of a route table through this gateway
   *
   * @param id ID of the route construct
   * @param routeTableId Route table to add the default route to
   * @returns Route construct
   */
  public addDefaultRoute(id: string, routeTableId: string): ec2.CfnRoute {
    return new ec2.CfnRoute(this, id, {
      routeTableId,
      destinationCidrBlock: ANY_IPV4_CIDR,
      natGatewayId: this.natGateway.ref,
    });
  }
}

export {
  NatGateway,
  NatGatewayProps,
}
