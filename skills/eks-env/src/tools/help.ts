/**
 * Show general help or command-specific help. Returns false for an unknown command.
 */
export function showHelp(command?: string): boolean {
  if (!command) {
    showGeneralHelp();
    return true;
  }

  const helpText = getCommandHelp(command);
  if (!helpText) {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'eksenv help' to see all commands");
    return false;
  }

  console.error(helpText.trim());
  return true;
}

function showGeneralHelp() {
  console.error("eksenv - EKS environment deploy and teardown");
  console.error("=".repeat(60));
  console.error("");
  console.error("Usage:");
  console.error("  eksenv <command> [options]");
  console.error("");
  console.error("Commands:");
  console.error("  help [cmd]      Show help for command");
  console.error("  deploy          Provision the cluster and install the chart");
  console.error("  status          Show what exists in the environment");
  console.error("  teardown        Delete every resource of the environment");
  console.error("");
  console.error("Common options:");
  console.error("  --env-file <path>     Read KEY=VALUE settings (flags win)");
  console.error("  --profile <name>      AWS profile (default: credential chain)");
  console.error("  --region <region>     AWS region (default: us-east-1)");
  console.error("  --vpc-tag <name>      Name tag of the VPC (default: eks-vpc)");
  console.error("  --cluster <name>      EKS cluster name");
  console.error("  --terraform-dir <d>   Terraform configuration (default: ./terraform)");
  console.error("");
  console.error("Examples:");
  console.error("  eksenv status --region us-west-2");
  console.error("  eksenv teardown --dry-run");
  console.error("  eksenv help teardown");
  console.error("");
  console.error("Results are printed as JSON on stdout; progress goes to stderr.");
}

function getCommandHelp(command: string): string | null {
  const helpTexts: Record<string, string> = {
    deploy: `
eksenv deploy - Provision the cluster and install the chart

Description:
  Runs terraform init, plan and apply, points kubectl at the new cluster,
  waits for a Ready node, installs the AWS Load Balancer Controller and
  then the application chart, and waits for the ingress to get an address.

Options:
  --chart-dir <dir>     Helm chart to install (default: ./chart)
  --release <name>      Release name (default: app)
  --namespace <name>    Namespace for the release (default: default)
  --ingress <name>      Ingress to wait for (default: <release>-ingress)
  --no-alb-controller   Skip the load balancer controller
  --output-env <path>   Write the resulting settings as an env file
  --overwrite-env       Replace an existing env file

Env file waits (milliseconds):
  NODE_READY_WAIT_MS    Wait for a Ready node (default: 300000)
  INGRESS_WAIT_MS       Wait for the ingress address (default: 300000)
  POLL_INTERVAL_MS      Time between checks (default: 10000)

Example:
  eksenv deploy --region us-west-2 --output-env eks.env
`,
    status: `
eksenv status - Show what exists in the environment

Description:
  Discovers the environment's resources without changing anything and
  runs the same verification teardown ends with.

Options:
  --hosted-zone <zone>  Also list the records of this zone (id or name)

Example:
  eksenv status --env-file eks.env
`,
    teardown: `
eksenv teardown - Delete every resource of the environment

Description:
  Deletes in dependency order: nodegroups and cluster, listeners, load
  balancers and target groups, network interfaces, security groups,
  NAT gateways, addresses, gateways, subnets, route tables, the VPC and
  DNS records. Then runs terraform destroy, escalating to a refresh-free
  destroy, targeted destroys and direct deletion when it fails, and
  verifies that nothing is left.

  Running it again on a clean environment is safe.

Options:
  --force                   Detach and delete in-use network interfaces
  --dry-run                 Show what would be deleted and stop
  --hosted-zone <zone>      Zone whose records are removed (id or name)
  --delete-hosted-zone      Also delete the zone once it is empty
  --escalation-target <a>   Terraform address for a targeted destroy (repeatable)
  --dns-override <host=ip>  Hosts entry while escalating (repeatable)
  --hosts-file <path>       Hosts file to edit (default: /etc/hosts)

Exit codes:
  0  clean
  2  partial (something was left, see "remaining")
  1  failed or aborted

Example:
  eksenv teardown --force --hosted-zone example.com
`,
  };

  return helpTexts[command] ?? null;
}
