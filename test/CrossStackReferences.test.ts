import * as cdk from 'aws-cdk-lib';
import { Template } from 'aws-cdk-lib/assertions';

import { VpcExport } from '../src/constants/Common';
import { CrossStackReferences } from '../src/constructs/CrossStackReferences';

describe('CrossStackReferences', () => {
  let stack: cdk.Stack;

  beforeEach(() => {
    stack = new cdk.Stack(new cdk.App(), 'ConsumerStack');
  });

  test('should name exports after the exporting stack', () => {
    expect(CrossStackReferences.exportName('NetworkVpcStack', VpcExport.VPC_ID)).toBe('NetworkVpcStack-VpcId');
    expect(CrossStackReferences.exportName('NetworkVpcStack', VpcExport.PRIVATE_ROUTE_TABLE_IDS))
      .toBe('NetworkVpcStack-PrivateRouteTableIds');
  });

  test('should join literal IDs into a single comma separated value', () => {
    expect(stack.resolve(CrossStackReferences.joinIds(['subnet-1', 'subnet-2']))).toBe('subnet-1,subnet-2');
  });

  test('should select an item of an imported list', () => {
    const encoded = CrossStackReferences.importValue('NetworkVpcStack', VpcExport.PUBLIC_SUBNET_IDS);

    expect(stack.resolve(CrossStackReferences.selectId(encoded, 1))).toEqual({
      'Fn::Select': [1, { 'Fn::Split': [',', { 'Fn::ImportValue': 'NetworkVpcStack-PublicSubnetIds' }] }],
    });
  });

  test('should map imported subnets per availability zone', () => {
    const network = CrossStackReferences.importNetwork('NetworkVpcStack', ['us-east-1a', 'us-east-1b'], true);

    expect(stack.resolve(network.vpcId)).toEqual({ 'Fn::ImportValue': 'NetworkVpcStack-VpcId' });
    expect(stack.resolve(network.vpcCidrBlock)).toEqual({ 'Fn::ImportValue': 'NetworkVpcStack-VpcCidrBlock' });
    expect(network.azConfigurations.map((azConfiguration) => azConfiguration.availabilityZone))
      .toEqual(['us-east-1a', 'us-east-1b']);
    expect(stack.resolve(network.azConfigurations[1].privateRouteTableId)).toEqual({
      'Fn::Select': [1, { 'Fn::Split': [',', { 'Fn::ImportValue': 'NetworkVpcStack-PrivateRouteTableIds' }] }],
    });
  });

  test('should leave private values out when not requested', () => {
    const network = CrossStackReferences.importNetwork('NetworkVpcStack', ['us-east-1a'], false);

    expect(network.azConfigurations[0].privateSubnetId).toBeUndefined();
    expect(network.azConfigurations[0].privateRouteTableId).toBeUndefined();
    expect(stack.resolve(network.azConfigurations[0].publicSubnetId)).toEqual({
      'Fn::Select': [0, { 'Fn::Split': [',', { 'Fn::ImportValue': 'NetworkVpcStack-PublicSubnetIds' }] }],
    });
  });

  test('should only export the private values it is given', () => {
    const exporter = new cdk.Stack(new cdk.App(), 'ExporterStack', { stackName: 'ExporterStack' });
    CrossStackReferences.exportNetwork(exporter, {
      vpcId: 'vpc-0123',
      vpcCidrBlock: '10.0.0.0/16',
      publicSubnetIds: ['subnet-a', 'subnet-b'],
    });
    const template = Template.fromStack(exporter);

    template.hasOutput('VpcId', {
      Value: 'vpc-0123',
      Export: { Name: 'ExporterStack-VpcId' },
    });
    template.hasOutput('PublicSubnetIds', {
      Value: 'subnet-a,subnet-b',
      Export: { Name: 'ExporterStack-PublicSubnetIds' },
    });
    expect(Object.keys(template.findOutputs('*'))).toEqual(['VpcId', 'VpcCidrBlock', 'PublicSubnetIds']);
  });
});
