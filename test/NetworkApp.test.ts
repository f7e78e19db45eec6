import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { readFileSync } from 'fs';
import { join } from 'path';

import { createNetworkApp } from '../src/NetworkApp';
import { Ec2Stack } from '../src/stacks/Ec2';
import { PublicVpcStack } from '../src/stacks/PublicVpc';
import { VpcStack } from '../src/stacks/Vpc';

function createWithContext(context: Record<string, unknown>) {
  return createNetworkApp(new cdk.App({ context }), {});
}

describe('createNetworkApp', () => {
  test('should declare the routed VPC stack and an EC2 stack depending on it by default', () => {
    const { vpcStack, ec2Stack } = createWithContext({});

    expect(vpcStack).toBeInstanceOf(VpcStack);
    expect(vpcStack.stackName).toBe('NetworkVpcStack');
    expect(vpcStack.region).toBe('us-east-1');
    expect(ec2Stack).toBeInstanceOf(Ec2Stack);
    expect(ec2Stack?.stackName).toBe('NetworkEc2Stack');
    expect(ec2Stack?.dependencies).toEqual([vpcStack]);
  });

  test('should declare the public-only VPC stack for the public-only layout', () => {
    const { vpcStack, ec2Stack } = createWithContext({
      vpcLayout: 'public-only',
      ec2Topology: 'single-instance',
    });

    expect(vpcStack).toBeInstanceOf(PublicVpcStack);
    expect(vpcStack.node.id).toBe('PublicVpcStack');
    expect(ec2Stack?.dependencies).toEqual([vpcStack]);
  });

  test('should skip the EC2 stack when the topology is none', () => {
    const app = new cdk.App({ context: { ec2Topology: 'none' } });
    const { ec2Stack } = createNetworkApp(app, {});

    expect(ec2Stack).toBeUndefined();
    expect(app.node.children.filter((child) => child instanceof cdk.Stack)).toHaveLength(1);
  });

  test('should not generate the bootstrap version rule by default', () => {
    const { vpcStack, ec2Stack } = createWithContext({});

    expect(Template.fromStack(vpcStack).findParameters('BootstrapVersion')).toEqual({});
    expect(Template.fromStack(vpcStack).findRules('CheckBootstrapVersion')).toEqual({});
    expect(ec2Stack).toBeDefined();
    if (ec2Stack !== undefined) {
      expect(Template.fromStack(ec2Stack).findParameters('BootstrapVersion')).toEqual({});
    }
  });

  test('should generate the bootstrap version rule on every stack when enabled', () => {
    const { vpcStack, ec2Stack } = createWithContext({ generateBootstrapVersionRule: true });

    expect(vpcStack.synthesizer).not.toBe(ec2Stack?.synthesizer);
    expect(Object.keys(Template.fromStack(vpcStack).findParameters('BootstrapVersion'))).toEqual(['BootstrapVersion']);
    expect(ec2Stack).toBeDefined();
    if (ec2Stack !== undefined) {
      expect(Object.keys(Template.fromStack(ec2Stack).findParameters('BootstrapVersion')))
        .toEqual(['BootstrapVersion']);
    }
  });

  test('should tag every resource with the project name', () => {
    const { vpcStack } = createWithContext({ ec2Topology: 'none' });

    Template.fromStack(vpcStack).hasResourceProperties('AWS::EC2::VPC', {
      Tags: Match.arrayWith([{ Key: 'Project', Value: 'network-infrastructure' }]),
    });
  });

  test('should synthesize with the context shipped in cdk.json', () => {
    const cdkJson: { context: Record<string, unknown> } = JSON.parse(
      readFileSync(join(__dirname, '..', 'cdk.json'), 'utf-8'));
    const { vpcStack, ec2Stack } = createWithContext(cdkJson.context);

    expect(Object.keys(cdkJson.context).filter((key: string) => key.startsWith('@aws-cdk/'))).toEqual([]);
    expect(vpcStack).toBeInstanceOf(VpcStack);
    expect(ec2Stack).toBeInstanceOf(Ec2Stack);
  });

  test('should copy the NAT instance user data beside the compiled constructs', () => {
    const packageJson: { scripts: Record<string, string> } = JSON.parse(
      readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

    expect(packageJson.scripts.build).toBe('tsc && cp -r src/constructs/user-data dist/src/constructs/');
  });
});
