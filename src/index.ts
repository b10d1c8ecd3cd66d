import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs } from './cli/parser';
import { getConfig } from './config/config';
import { initK8sClients } from './cluster/k8sClient';
import { runAuditEnforce } from './cli/auditEnforceCommand';
import { runNamespaceApply } from './cli/namespaceApplyCommand';
import { DEFAULT_LOG_PATTERN, runControllerLogs } from './cli/controllerLogsCommand';
import { runOperatorSearch } from './cli/operatorSearchCommand';
import { runSccTemplates } from './cli/sccTemplatesCommand';

dotenv.config();

const logger = getLogger();

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();

  logger.info(`Running ${args.command}`);

  switch (args.command) {
    case 'audit-enforce':
      // Builds its own clients: the warning collector has to be wired into them
      await runAuditEnforce({ kubeconfig: args.kubeconfig, context: args.context, showWarnings: args.showWarnings });
      return;
    case 'scc-templates':
      await runSccTemplates(args.out ?? config.outputDir);
      return;
    default:
      break;
  }

  initK8sClients({ kubeconfig: args.kubeconfig, context: args.context });

  switch (args.command) {
    case 'namespace-apply':
      await runNamespaceApply({ fieldManager: args.fieldManager ?? config.fieldManager });
      break;
    case 'controller-logs': {
      const matches = await runControllerLogs({
        pattern: args.pattern ?? DEFAULT_LOG_PATTERN,
        create: args.create,
        logs: args.logs,
        debug: args.debug,
        logsDir: args.out ?? config.logsDir
      });
      logger.info(`${matches.length} pod(s) matched`);
      break;
    }
    case 'operator-search':
      await runOperatorSearch(args.searchTerm ?? '');
      break;
  }
}

main().catch((e: unknown) => {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});
