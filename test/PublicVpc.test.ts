import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';

import { PublicVpcStack } from '../src/stacks/PublicVpc';

describe('PublicVpcStack', () => {
  let template: Template;

  beforeEach(() => {
    const app = new cdk.App();
    const stack = new PublicVpcStack(app, 'TestPublicVpcStack', {
      stackName: 'TestPublicVpcStack',
      env: { region: 'us-east-1' },
      vpcName: 'TestPublicVpc',
      vpcCidr: '10.0.0.0/16',
      availabilityZoneSuffixes: ['a', 'b'],
    });
    template = Template.fromStack(stack);
  });

  test('should create the VPC without DNS hostnames', () => {
    template.hasResourceProperties('AWS::EC2::VPC', {
      CidrBlock: '10.0.0.0/16',
      EnableDnsHostnames: false,
      EnableDnsSupport: true,
      Tags: Match.arrayWith([{ Key: 'Name', Value: 'TestPublicVpc' }]),
    });
  });

  test('should create only public subnets in the given zones', () => {
    template.resourceCountIs('AWS::EC2::Subnet', 2);
    template.hasResourceProperties('AWS::EC2::Subnet', {
      AvailabilityZone: 'us-east-1a',
      CidrBlock: '10.0.0.0/24',
      MapPublicIpOnLaunch: true,
    });
    template.hasResourceProperties('AWS::EC2::Subnet', {
      AvailabilityZone: 'us-east-1b',
      CidrBlock: '10.0.1.0/24',
      MapPublicIpOnLaunch: true,
    });
  });

  test('should not create NAT gateways nor restrict the default security group', () => {
    template.resourceCountIs('AWS::EC2::InternetGateway', 1);
    template.resourceCountIs('AWS::EC2::NatGateway', 0);
    template.resourceCountIs('Custom::VpcRestrictDefaultSG', 0);
  });

  test('should export public values only', () => {
    template.hasOutput('VpcId', {
      Export: { Name: 'TestPublicVpcStack-VpcId' },
    });
    template.hasOutput('VpcCidrBlock', {
      Export: { Name: 'TestPublicVpcStack-VpcCidrBlock' },
    });
    template.hasOutput('PublicSubnetIds', {
      Export: { Name: 'TestPublicVpcStack-PublicSubnetIds' },
    });
    expect(template.findOutputs('PrivateSubnetIds')).toEqual({});
    expect(template.findOutputs('PrivateRouteTableIds')).toEqual({});
  });
});
