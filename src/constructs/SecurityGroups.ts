import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { SSH_PORT } from '../constants/Common';

/**
 * Ingress rule allowing a single TCP port from a CIDR block
 */
function tcpFromCidr(port: number, cidrIp: string): ec2.CfnSecurityGroup.IngressProperty {
  return {
    ipProtocol: 'tcp',
    fromPort: port,
    toPort: port,
    cidrIp,
  };
}

abstract class SecurityGroups {
  /**
   * Security group for a publicly reachable SSH entry point
   *
   * @param scope In which construct this resource must be provisioned
   * @param id ID of the security group, also used as group name
   * @param vpcId VPC where the group lives
   * @param sshIngressCidr Source CIDR allowed on SSH
   * @param description Group description
   * @returns Security group construct
   */
  public static createSshSecurityGroup(
    scope: Construct,
    id: string,
    vpcId: string,
    sshIngressCidr: string,
    description: string,
  ): ec2.CfnSecurityGroup {
    return new ec2.CfnSecurityGroup(scope, id, {
      groupName: id,
      groupDescription: description,
      vpcId,
      securityGroupIngress: [
        tcpFromCidr(SSH_PORT, sshIngressCidr),
      ],
    });
  }

  /**
   * Security group for instances in private subnets, only reachable on SSH from the bastion host
   *
   * @param scope In which construct this resource must be provisioned
   * @param id ID of the security group, also used as group name
   * @param vpcId VPC where the group lives
   * @param bastionSecurityGroup Security group of the bastion host
   * @returns Security group construct
   */
  public static createPrivateInstanceSecurityGroup(
    scope: Construct,
    id: string,
    vpcId: string,
    bastionSecurityGroup: ec2.CfnSecurityGroup,
  ): ec2.CfnSecurityGroup {
    return new ec2.CfnSecurityGroup(scope, id, {
      groupName: id,
      groupDescription: 'Security group for private EC2 instance',
      vpcId,
      securityGroupIngress: [{
        ipProtocol: 'tcp',
        fromPort: SSH_PORT,
        toPort: SSH_PORT,
        sourceSecurityGroupId: bastionSecurityGroup.ref,
      }],
    });
  }

  /**
   * Security group for NAT instances: web and ICMP traffic from inside the VPC, SSH for administration
   *
   * @param scope In which construct this resource must be provisioned
   * @param id ID of the security group
   * @param vpcId VPC where the group lives
   * @param vpcCidrBlock CIDR of the VPC whose traffic is forwarded
   * @param sshIngressCidr Source CIDR allowed on SSH
   * @returns Security group construct
   */
  public static createNatInstanceSecurityGroup(
    scope: Construct,
    id: string,
    vpcId: string,
    vpcCidrBlock: string,
    sshIngressCidr: string,
  ): ec2.CfnSecurityGroup {
    return new ec2.CfnSecurityGroup(scope, id, {
      groupName: 'NatInstanceSG',
      groupDescription: 'Security group for NAT instance',
      vpcId,
      securityGroupIngress: [
        tcpFromCidr(80, vpcCidrBlock),
        tcpFromCidr(443, vpcCidrBlock),
        {
          ipProtocol: 'icmp',
          fromPort: -1,
          toPort: -1,
          cidrIp: vpcCidrBlock,
        },
        tcpFromCidr(SSH_PORT, sshIngressCidr),
      ],
    });
  }
}

export {
  SecurityGroups,
}
