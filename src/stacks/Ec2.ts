import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { ANY_IPV4_CIDR, Ec2Topology } from '../constants/Common';
import { CrossStackReferences } from '../constructs/CrossStackReferences';
import { Instances } from '../constructs/Instances';
import { NatGateway } from '../constructs/NatGateway';
import { NatInstance } from '../constructs/NatInstance';
import { SecurityGroups } from '../constructs/SecurityGroups';
import { AzConfiguration, ImportedNetwork } from '../model/Vpc';

interface Ec2StackProps extends cdk.StackProps {
  /**
   * Name of the VPC stack whose exports are imported
   */
  vpcStackName: string;
  availabilityZoneSuffixes: string[];
  topology: Exclude<Ec2Topology, Ec2Topology.NONE>;
  keyPairName: string;
  natInstanceAmiId: string;
  sshIngressCidr: string;
}

/**
 * Provision EC2 instances (and NAT devices for the private subnets) on top of a VPC exported by another stack
 *
 * The declared resources depend on the topology:
 *  - single-instance: one public instance reachable on SSH
 *  - bastion-nat-instance: bastion host, NAT instance and one private instance, every private route table
 *    egressing through the NAT instance
 *  - bastion-nat-gateway: same as above plus a NAT Gateway serving every AZ but the first one
 */
class Ec2Stack extends cdk.Stack {
  private readonly network: ImportedNetwork;
  private readonly keyName: string;
  private readonly sshIngressCidr: string;

  public readonly keyPair: ec2.CfnKeyPair;
  public readonly publicInstance?: ec2.CfnInstance;
  public readonly bastionHost?: ec2.CfnInstance;
  public readonly privateInstance?: ec2.CfnInstance;
  public readonly natInstance?: NatInstance;
  public readonly natGateway?: NatGateway;

  constructor(scope: Construct, id: string, props: Ec2StackProps) {
    super(scope, id, props);

    const availabilityZones = props.availabilityZoneSuffixes.map((suffix: string) => `${this.region}${suffix}`);
    const needsPrivateSubnets = props.topology !== Ec2Topology.SINGLE_INSTANCE;
    this.network = CrossStackReferences.importNetwork(props.vpcStackName, availabilityZones, needsPrivateSubnets);
    this.sshIngressCidr = props.sshIngressCidr;

    cdk.Annotations.of(this).addInfo(`Declaring '${props.topology}' EC2 topology on top of '${props.vpcStackName}'`);
    if (props.sshIngressCidr === ANY_IPV4_CIDR) {
      cdk.Annotations.of(this).addWarning('SSH ingress is open to any IPv4 address, consider restricting sshIngressCidr');
    }

    this.keyPair = new ec2.CfnKeyPair(this, 'KeyPair', {
      keyName: props.keyPairName,
    });
    // Ref of a key pair is its name, referencing it makes instances wait for the key pair
    this.keyName = this.keyPair.ref;

    const imageId = Instances.latestAmazonLinux2ImageId(this);
    const firstAz = this.network.azConfigurations[0];

    if (props.topology === Ec2Topology.SINGLE_INSTANCE) {
      const securityGroup = SecurityGroups.createSshSecurityGroup(this, 'PublicInstanceSecurityGroup',
        this.network.vpcId, this.sshIngressCidr, 'Security group for public EC2 instance');
      this.publicInstance = Instances.createInstance(this, 'PublicEC2Instance', {
        imageId,
        keyName: this.keyName,
        subnetId: firstAz.publicSubnetId,
        securityGroup,
        associatePublicIpAddress: true,
      });

      new cdk.CfnOutput(this, 'PublicInstancePublicIP', {
        description: 'Public IP address of the public EC2 instance',
        value: this.publicInstance.attrPublicIp,
      });
      new cdk.CfnOutput(this, 'PublicInstanceId', {
        description: 'ID of the public EC2 instance',
        value: this.publicInstance.ref,
      });

      return;
    }

    const bastionSecurityGroup = SecurityGroups.createSshSecurityGroup(this, 'BastionSecurityGroup',
      this.network.vpcId, this.sshIngressCidr, 'Security group for Bastion host');
    const privateInstanceSecurityGroup = SecurityGroups.createPrivateInstanceSecurityGroup(this,
      'PrivateInstanceSecurityGroup', this.network.vpcId, bastionSecurityGroup);

    this.natInstance = new NatInstance(this, 'NatInstance', {
      vpcId: this.network.vpcId,
      vpcCidrBlock: this.network.vpcCidrBlock,
      subnetId: firstAz.publicSubnetId,
      imageId: props.natInstanceAmiId,
      keyName: this.keyName,
      sshIngressCidr: this.sshIngressCidr,
    });

    this.bastionHost = Instances.createInstance(this, 'BastionHost', {
      imageId,
      keyName: this.keyName,
      subnetId: firstAz.publicSubnetId,
      securityGroup: bastionSecurityGroup,
      associatePublicIpAddress: true,
    });
    this.privateInstance = Instances.createInstance(this, 'PrivateEC2Instance', {
      imageId,
      keyName: this.keyName,
      subnetId: Ec2Stack.getPrivateSubnetId(firstAz),
      securityGroup: privateInstanceSecurityGroup,
      associatePublicIpAddress: false,
    });

    if (props.topology === Ec2Topology.BASTION_NAT_GATEWAY) {
      // The gateway lives in the last AZ and serves every AZ but the first one, which keeps the NAT instance
      const azConfigurations = this.network.azConfigurations;
      this.natGateway = new NatGateway(this, 'NatGateway', {
        subnetId: azConfigurations[azConfigurations.length - 1].publicSubnetId,
      });
      this.routePrivateSubnets(this.natInstance, [firstAz]);
      this.routePrivateSubnets(this.natGateway, azConfigurations.slice(1));
    } else {
      this.routePrivateSubnets(this.natInstance, this.network.azConfigurations);
    }

    this.createOutputs();
  }

  /**
   * Adds the default route of every given AZ private route table towards a NAT device
   *
   * @param natDevice NAT instance or NAT Gateway construct
   * @param azConfigurations Availability zones whose private subnets egress through the device
   */
  private routePrivateSubnets(natDevice: NatInstance | NatGateway, azConfigurations: AzConfiguration[]): void {
    azConfigurations.forEach((azConfiguration: AzConfiguration) => {
      const suffix = azConfiguration.availabilityZone.slice(-1).toUpperCase();
      const routeTableId = azConfiguration.privateRouteTableId;
      if (routeTableId === undefined) {
        throw new Error(`No private route table imported for '${azConfiguration.availabilityZone}'`);
      }
      natDevice.addDefaultRoute(`PrivateSubnet${suffix}DefaultRoute`, routeTableId);
    });
  }

  private createOutputs(): void {
    if (this.bastionHost !== undefined) {
      new cdk.CfnOutput(this, 'BastionPublicIP', {
        description: 'Public IP address of the Bastion host',
        value: this.bastionHost.attrPublicIp,
      });
      new cdk.CfnOutput(this, 'BastionInstanceId', {
        description: 'ID of the Bastion host',
        value: this.bastionHost.ref,
      });
    }
    if (this.privateInstance !== undefined) {
      new cdk.CfnOutput(this, 'PrivateInstancePrivateIP', {
        description: 'Private IP address of the private EC2 instance',
        value: this.privateInstance.attrPrivateIp,
      });
    }
    if (this.natInstance !== undefined) {
      new cdk.CfnOutput(this, 'NatInstancePublicIP', {
        description: 'Public IP address of the NAT instance',
        value: this.natInstance.instance.attrPublicIp,
      });
      new cdk.CfnOutput(this, 'NatInstanceId', {
        description: 'ID of the NAT instance',
        value: this.natInstance.instance.ref,
      });
    }
    if (this.natGateway !== undefined) {
      new cdk.CfnOutput(this, 'NatGatewayId', {
        description: 'ID of the NAT Gateway',
        value: this.natGateway.natGateway.ref,
      });
      new cdk.CfnOutput(this, 'NatGatewayPublicIP', {
        description: 'Elastic IP address of the NAT Gateway',
        value: this.natGateway.elasticIp.ref,
      });
    }
  }

  private static getPrivateSubnetId(azConfiguration: AzConfiguration): string {
    if (azConfiguration.privateSubnetId === undefined) {
      throw new Error(`No private subnet imported for '${azConfiguration.availabilityZone}'`);
    }

    return azConfiguration.privateSubnetId;
  }
}

export {
  Ec2Stack,
  Ec2StackProps,
}
