import { z } from 'zod';
import { stringify } from 'yaml';
import { getK8sClients } from '../cluster/k8sClient';

export const CLUSTER_OPERATOR_RESOURCE = {
  group: 'config.openshift.io',
  version: 'v1',
  plural: 'clusteroperators'
} as const;

const clusterOperatorListSchema = z.object({
  items: z.array(
    z
      .object({
        metadata: z.object({ name: z.string() }).passthrough()
      })
      .passthrough()
  )
});

export type ClusterOperator = z.infer<typeof clusterOperatorListSchema>['items'][number];

// Case-insensitive substring match, line by line
export function grepLines(text: string, term: string): string[] {
  const needle = term.toLowerCase();
  return text.split('\n').filter(line => line.toLowerCase().includes(needle));
}

export async function listClusterOperators(): Promise<ClusterOperator[]> {
  const { customObjectsApi } = getK8sClients();
  const response: unknown = await customObjectsApi.listClusterCustomObject({ ...CLUSTER_OPERATOR_RESOURCE });
  return clusterOperatorListSchema.parse(response).items;
}

// Search every ClusterOperator's YAML for the term.
// Returns the matching lines keyed by operator name, only for operators that matched.
export async function runOperatorSearch(term: string): Promise<Map<string, string[]>> {
  if (!term) {
    throw new Error('Please provide a search term. Usage: operator-search <search_term>');
  }

  const found = new Map<string, string[]>();
  for (const operator of await listClusterOperators()) {
    const name = operator.metadata.name;
    // eslint-disable-next-line no-console
    console.log(`Searching clusteroperator/${name} for '${term}'...`);

    const lines = grepLines(stringify(operator), term);
    if (lines.length > 0) {
      found.set(name, lines);
      // eslint-disable-next-line no-console
      console.log(`Found in clusteroperator/${name}:\n${lines.join('\n')}\n---`);
    }
  }

  // eslint-disable-next-line no-console
  console.log('Search complete.');
  return found;
}
