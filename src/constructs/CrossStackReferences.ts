import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';

import { VpcExport } from '../constants/Common';
import { AzConfiguration, ImportedNetwork, NetworkExports } from '../model/Vpc';

/**
 * Separator used to pack several IDs in a single exported value
 */
const ID_LIST_SEPARATOR = ',';

/**
 * Helpers to publish and consume VPC values between stacks through CloudFormation exports
 *
 * Lists of IDs are exported as a single comma separated string, consumers pick items with `Fn::Select`
 * over `Fn::Split`
 */
abstract class CrossStackReferences {
  /**
   * @example exportName('NetworkVpcStack', VpcExport.VPC_ID) -> 'NetworkVpcStack-VpcId'
   */
  public static exportName(stackName: string, key: VpcExport): string {
    return `${stackName}-${key}`;
  }

  /**
   * Creates an exported output in the scope stack, named after the stack and the key
   *
   * @param scope In which construct the output must be declared
   * @param key Export key, also used as output logical ID
   * @param value Value to export
   * @param description Output description
   * @returns Output construct
   */
  public static exportValue(scope: Construct, key: VpcExport, value: string, description: string): cdk.CfnOutput {
    return new cdk.CfnOutput(scope, key, {
      description,
      value,
      exportName: CrossStackReferences.exportName(cdk.Stack.of(scope).stackName, key),
    });
  }

  /**
   * Exports every VPC value a dependent stack may need
   *
   * @param scope VPC stack or construct inside it
   * @param network Values to export, private values are skipped when absent
   */
  public static exportNetwork(scope: Construct, network: NetworkExports): void {
    CrossStackReferences.exportValue(scope, VpcExport.VPC_ID, network.vpcId, 'ID of the VPC');
    CrossStackReferences.exportValue(scope, VpcExport.VPC_CIDR_BLOCK, network.vpcCidrBlock, 'CIDR block of the VPC');
    CrossStackReferences.exportValue(scope, VpcExport.PUBLIC_SUBNET_IDS,
      CrossStackReferences.joinIds(network.publicSubnetIds), 'Comma separated public subnet IDs');

    if (network.privateSubnetIds !== undefined) {
      CrossStackReferences.exportValue(scope, VpcExport.PRIVATE_SUBNET_IDS,
        CrossStackReferences.joinIds(network.privateSubnetIds), 'Comma separated private subnet IDs');
    }
    if (network.privateRouteTableIds !== undefined) {
      CrossStackReferences.exportValue(scope, VpcExport.PRIVATE_ROUTE_TABLE_IDS,
        CrossStackReferences.joinIds(network.privateRouteTableIds), 'Comma separated private route table IDs');
    }
  }

  public static joinIds(ids: string[]): string {
    return cdk.Fn.join(ID_LIST_SEPARATOR, ids);
  }

  public static importValue(stackName: string, key: VpcExport): string {
    return cdk.Fn.importValue(CrossStackReferences.exportName(stackName, key));
  }

  /**
   * Picks one ID from an exported comma separated list
   *
   * @param encodedIds Exported (or imported) comma separated list
   * @param index Position of the ID in the list
   * @returns `Fn::Select` token
   */
  public static selectId(encodedIds: string, index: number): string {
    return cdk.Fn.select(index, cdk.Fn.split(ID_LIST_SEPARATOR, encodedIds));
  }

  /**
   * Imports the values of a VPC stack and maps them per availability zone
   *
   * @param vpcStackName Name of the stack that exports the VPC values
   * @param availabilityZones Availability zones of the VPC, in the order subnets were exported
   * @param includePrivate Whether private subnets and route tables must be imported too
   * @returns Imported values
   */
  public static importNetwork(
    vpcStackName: string,
    availabilityZones: string[],
    includePrivate: boolean,
  ): ImportedNetwork {
    const publicSubnetIds = CrossStackReferences.importValue(vpcStackName, VpcExport.PUBLIC_SUBNET_IDS);
    const privateSubnetIds = includePrivate
      ? CrossStackReferences.importValue(vpcStackName, VpcExport.PRIVATE_SUBNET_IDS)
      : undefined;
    const privateRouteTableIds = includePrivate
      ? CrossStackReferences.importValue(vpcStackName, VpcExport.PRIVATE_ROUTE_TABLE_IDS)
      : undefined;

    const azConfigurations = availabilityZones.map((availabilityZone: string, index: number): AzConfiguration => ({
      availabilityZone,
      publicSubnetId: CrossStackReferences.selectId(publicSubnetIds, index),
      privateSubnetId: privateSubnetIds !== undefined
        ? CrossStackReferences.selectId(privateSubnetIds, index)
        : undefined,
      privateRouteTableId: privateRouteTableIds !== undefined
        ? CrossStackReferences.selectId(privateRouteTableIds, index)
        : undefined,
    }));

    return {
      vpcId: CrossStackReferences.importValue(vpcStackName, VpcExport.VPC_ID),
      vpcCidrBlock: CrossStackReferences.importValue(vpcStackName, VpcExport.VPC_CIDR_BLOCK),
      azConfigurations,
    };
  }
}

export {
  CrossStackReferences,
}
