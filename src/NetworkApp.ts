import * as cdk from 'aws-cdk-lib';

import { loadNetworkConfig } from './config/NetworkConfig';
import { Ec2Topology, VpcLayout } from './constants/Common';
import { Ec2Stack } from './stacks/Ec2';
import { PublicVpcStack } from './stacks/PublicVpc';
import { VpcStack } from './stacks/Vpc';

interface NetworkStacks {
  vpcStack: VpcStack | PublicVpcStack;
  /**
   * Absent when the configured EC2 topology is `none`
   */
  ec2Stack?: Ec2Stack;
}

/**
 * Declares the VPC stack of the configured layout and, unless disabled, the EC2 stack consuming its exports
 *
 * @param app App holding the context to read the configuration from
 * @param environment Process environment, used for the CDK CLI default account and region
 * @returns Declared stacks
 */
function createNetworkApp(app: cdk.App, environment: NodeJS.ProcessEnv = process.env): NetworkStacks {
  const config = loadNetworkConfig(app.node, environment);
  const env = { account: config.account, region: config.region };
  // A synthesizer can only be bound to one stack
  const createSynthesizer = () => new cdk.DefaultStackSynthesizer({
    generateBootstrapVersionRule: config.generateBootstrapVersionRule,
  });

  const vpcStackProps = {
    stackName: config.vpcStackName,
    env,
    synthesizer: createSynthesizer(),
    vpcName: config.vpcName,
    vpcCidr: config.vpcCidr,
    availabilityZoneSuffixes: config.availabilityZoneSuffixes,
  };
  const vpcStack = config.vpcLayout === VpcLayout.PUBLIC_ONLY
    ? new PublicVpcStack(app, 'PublicVpcStack', vpcStackProps)
    : new VpcStack(app, 'VpcStack', vpcStackProps);

  cdk.Tags.of(app).add('Project', 'network-infrastructure');

  if (config.ec2Topology === Ec2Topology.NONE) {
    return { vpcStack };
  }

  const ec2Stack = new Ec2Stack(app, 'Ec2Stack', {
    stackName: config.ec2StackName,
    env,
    synthesizer: createSynthesizer(),
    vpcStackName: config.vpcStackName,
    availabilityZoneSuffixes: config.availabilityZoneSuffixes,
    topology: config.ec2Topology,
    keyPairName: config.keyPairName,
    natInstanceAmiId: config.natInstanceAmiId,
    sshIngressCidr: config.sshIngressCidr,
  });
  // Imports resolve only once the VPC stack exports exist
  ec2Stack.addDependency(vpcStack);

  return { vpcStack, ec2Stack };
}

export {
  NetworkStacks,
  createNetworkApp,
}
