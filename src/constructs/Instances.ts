import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

import { INSTANCE_TYPE } from '../constants/Common';

interface InstanceOptions {
  imageId: string;
  keyName: string;
  subnetId: string;
  securityGroup: ec2.CfnSecurityGroup;
  associatePublicIpAddress: boolean;
  /**
   * Must be disabled for instances that forward traffic they are not the destination of
   *
   * @default true
   */
  sourceDestCheck?: boolean;
  /**
   * Base64 encoded user data
   */
  userData?: string;
}

abstract class Instances {
  /**
   * Declares an instance with a single network interface, tagged with its construct ID as name
   *
   * @param scope In which construct this resource must be provisioned
   * @param id ID of the instance, also used as Name tag
   * @param options Placement and image of the instance
   * @returns Instance construct
   */
  public static createInstance(scope: Construct, id: string, options: InstanceOptions): ec2.CfnInstance {
    return new ec2.CfnInstance(scope, id, {
      imageId: options.imageId,
      instanceType: INSTANCE_TYPE,
      keyName: options.keyName,
      networkInterfaces: [{
        deviceIndex: '0',
        associatePublicIpAddress: options.associatePublicIpAddress,
        deleteOnTermination: true,
        subnetId: options.subnetId,
        groupSet: [options.securityGroup.ref],
      }],
      sourceDestCheck: options.sourceDestCheck,
      userData: options.userData,
      tags: [{ key: 'Name', value: id }],
    });
  }

  /**
   * Latest Amazon Linux 2 x86_64 image, resolved at deploy time from the public SSM parameter
   *
   * @param scope Construct used to look up the stack the parameter is declared in
   * @returns AMI ID token
   */
  public static latestAmazonLinux2ImageId(scope: Construct): string {
    return ec2.MachineImage.latestAmazonLinux2({
      cpuType: ec2.AmazonLinuxCpuType.X86_64,
    }).getImage(scope).imageId;
  }
}

export {
  InstanceOptions,
  Instances,
}
