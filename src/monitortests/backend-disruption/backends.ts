import type { ProbeTarget } from '../../ports/backend-probe.port.js';

export interface BackendDefinition extends ProbeTarget {
  readonly testName: string;
  readonly description: string;
}

/** API backends polled for new-connection availability. */
export const API_BACKENDS: readonly BackendDefinition[] = [
  {
    name: 'kube-api',
    path: '/api/v1/namespaces/default',
    testName: '[sig-api-machinery] Kubernetes APIs remain available for new connections',
    description: 'Polls the Kubernetes API server for a core resource',
  },
  {
    name: 'openshift-api',
    path: '/apis/image.openshift.io/v1/namespaces/default/imagestreams',
    testName: '[sig-api-machinery] OpenShift APIs remain available for new connections',
    description: 'Polls the OpenShift aggregated API server for image streams',
  },
  {
    name: 'oauth-api',
    path: '/apis/oauth.openshift.io/v1/oauthclients',
    testName: '[sig-api-machinery] OAuth APIs remain available for new connections',
    description: 'Polls the OAuth API server for OAuth clients',
  },
];
