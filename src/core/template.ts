/**
 * Stack Template
 *
 * Minimal infrastructure description uploaded with every configuration
 * version. The flat configuration parameters are declared as template
 * parameters; the cluster log group is the only resource the lifecycle
 * controller itself rewrites.
 */

import type { ClusterConfig } from '../config/root.js';
import { isJsonObject, type JsonObject } from '../lib/json.js';

export const TEMPLATE_FORMAT_VERSION = '2010-09-09';
export const LOG_GROUP_TYPE = 'AWS::Logs::LogGroup';
export const LOG_GROUP_RESOURCE = 'ClusterLogGroup';

/**
 * Build the stack template for a configuration.
 *
 * @param clusterName - Cluster the template belongs to
 * @param config - Configuration with its private parameters set
 * @returns Template document
 */
export function buildStackTemplate(clusterName: string, config: ClusterConfig): JsonObject {
  const parameters: JsonObject = {};
  for (const key of Object.keys(config.toStorage().params).sort()) {
    parameters[key] = { Type: 'String' };
  }

  const resources: JsonObject = {};
  const logs = config.find('monitoring', 'monitoring_logs');
  if (logs?.getBool('Enabled') ?? true) {
    resources[LOG_GROUP_RESOURCE] = {
      Type: LOG_GROUP_TYPE,
      DeletionPolicy: logs?.getString('DeletionPolicy') ?? 'Delete',
      Properties: {
        LogGroupName: `/hpcstack/${clusterName}`,
        RetentionInDays: logs?.getNumber('RetentionInDays') ?? 180,
      },
    };
  }

  return {
    AWSTemplateFormatVersion: TEMPLATE_FORMAT_VERSION,
    Description: `hpcstack cluster ${clusterName}`,
    Parameters: parameters,
    Resources: resources,
  };
}

/**
 * Copy of a template in which every log group outlives the stack.
 *
 * @returns The rewritten template and the number of log groups changed
 */
export function retainLogGroups(template: JsonObject): { template: JsonObject; changed: number } {
  const copy = structuredClone(template);
  const resources = copy['Resources'];
  let changed = 0;
  if (isJsonObject(resources)) {
    for (const resource of Object.values(resources)) {
      if (isJsonObject(resource) && resource['Type'] === LOG_GROUP_TYPE && resource['DeletionPolicy'] !== 'Retain') {
        resource['DeletionPolicy'] = 'Retain';
        resource['UpdateReplacePolicy'] = 'Retain';
        changed++;
      }
    }
  }
  return { template: copy, changed };
}
