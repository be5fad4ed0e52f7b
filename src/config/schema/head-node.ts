/**
 * Head node sections
 */

import { HEAD_NODE_STOP, SUPPORTED, UNSUPPORTED } from '../../update/policy.js';
import {
  dcvOsValidator,
  disableSmtValidator,
  instanceTypeValidator,
  securityGroupsValidator,
  subnetValidator,
} from '../../validation/validators.js';
import type { SectionDefinition } from '../registry.js';

const CIDR = /(\d{1,3}\.){3}\d{1,3}\/\d{1,2}/;

export const headNodeSection: SectionDefinition = {
  key: 'head_node',
  maxInstances: 1,
  storage: 'params',
  validators: [disableSmtValidator],
  params: [
    {
      key: 'InstanceType',
      storageKey: 'HeadNodeInstanceType',
      type: 'string',
      required: true,
      updatePolicy: UNSUPPORTED,
      validators: [instanceTypeValidator],
    },
    {
      key: 'DisableSimultaneousMultithreading',
      storageKey: 'HeadNodeDisableSmt',
      type: 'bool',
      defaultValue: false,
      updatePolicy: UNSUPPORTED,
    },
    { key: 'Networking', storageKey: 'HeadNodeNetworkingSettings', type: 'settings', section: 'head_node_networking', required: true, updatePolicy: UNSUPPORTED },
    { key: 'Ssh', storageKey: 'HeadNodeSshSettings', type: 'settings', section: 'head_node_ssh', updatePolicy: UNSUPPORTED },
    { key: 'Dcv', storageKey: 'HeadNodeDcvSettings', type: 'settings', section: 'head_node_dcv', updatePolicy: HEAD_NODE_STOP },
  ],
};

export const headNodeNetworkingSection: SectionDefinition = {
  key: 'head_node_networking',
  maxInstances: 1,
  storage: 'params',
  params: [
    {
      key: 'SubnetId',
      storageKey: 'HeadNodeSubnetId',
      type: 'string',
      required: true,
      allowedValues: /subnet-[0-9a-z]+/,
      updatePolicy: UNSUPPORTED,
      validators: [subnetValidator],
    },
    {
      key: 'SecurityGroups',
      storageKey: 'HeadNodeSecurityGroups',
      type: 'string-list',
      allowedValues: /sg-[0-9a-z]+/,
      updatePolicy: SUPPORTED,
      validators: [securityGroupsValidator],
    },
    {
      key: 'ElasticIp',
      storageKey: 'HeadNodeElasticIp',
      type: 'string',
      allowedValues: /true|false|eipalloc-[0-9a-z]+/,
      updatePolicy: UNSUPPORTED,
    },
  ],
};

export const headNodeSshSection: SectionDefinition = {
  key: 'head_node_ssh',
  maxInstances: 1,
  autocreate: true,
  storage: 'params',
  params: [
    { key: 'KeyName', storageKey: 'KeyName', type: 'string', updatePolicy: UNSUPPORTED },
    {
      key: 'AllowedIps',
      storageKey: 'SshAllowedIps',
      type: 'string',
      allowedValues: CIDR,
      defaultValue: '0.0.0.0/0',
      updatePolicy: SUPPORTED,
    },
  ],
};

/**
 * Remote desktop access; any change needs the head node stopped.
 */
export const headNodeDcvSection: SectionDefinition = {
  key: 'head_node_dcv',
  maxInstances: 1,
  autocreate: true,
  storage: 'params',
  updatePolicyFloor: HEAD_NODE_STOP,
  validators: [dcvOsValidator],
  params: [
    { key: 'Enabled', storageKey: 'DcvEnabled', type: 'bool', defaultValue: false, updatePolicy: SUPPORTED },
    { key: 'Port', storageKey: 'DcvPort', type: 'int', defaultValue: 8443, updatePolicy: SUPPORTED },
    {
      key: 'AllowedIps',
      storageKey: 'DcvAllowedIps',
      type: 'string',
      allowedValues: CIDR,
      defaultValue: '0.0.0.0/0',
      updatePolicy: SUPPORTED,
    },
  ],
};
