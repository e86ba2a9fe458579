/**
 * Credential Catalog
 *
 * Every secret a deployment may need, where each source names it, and how
 * the resolved value is handed to the provisioning and configuration tools.
 */

export type CredentialKind = "value" | "path";

export type CredentialDefinition = {
  key: string;
  description: string;
  /** Environment variable consulted by the env source. */
  env: string;
  /** Other names accepted in local secrets files (.env, terraform.tfvars). */
  aliases: string[];
  /** Parameter name below the secret namespace. */
  parameter?: string;
  /** Stored encrypted and masked in logs. */
  secure: boolean;
  required: boolean;
  /** `path` values must name an existing file. */
  kind: CredentialKind;
  default?: string;
  /** Environment variable set for the provisioning tool subprocess. */
  exportEnv?: string;
  /** Variable name used in the playbook vars file (defaults to key). */
  ansibleVar?: string;
};

export const DEFAULT_CREDENTIAL_CATALOG: readonly CredentialDefinition[] = [
  {
    key: "aws_access_key_id",
    description: "Cloud access key id",
    env: "AWS_ACCESS_KEY_ID",
    aliases: ["aws_access_key"],
    secure: true,
    required: true,
    kind: "value",
    exportEnv: "AWS_ACCESS_KEY_ID",
    ansibleVar: "aws_access_key",
  },
  {
    key: "aws_secret_access_key",
    description: "Cloud secret access key",
    env: "AWS_SECRET_ACCESS_KEY",
    aliases: ["aws_secret_key"],
    secure: true,
    required: true,
    kind: "value",
    exportEnv: "AWS_SECRET_ACCESS_KEY",
    ansibleVar: "aws_secret_key",
  },
  {
    key: "aws_region",
    description: "Cloud region",
    env: "AWS_DEFAULT_REGION",
    aliases: ["AWS_REGION"],
    secure: false,
    required: false,
    kind: "value",
    default: "us-east-1",
    exportEnv: "AWS_DEFAULT_REGION",
  },
  {
    key: "docker_hub_username",
    description: "Container registry username",
    env: "DOCKER_HUB_USERNAME",
    aliases: [],
    parameter: "docker_hub_username",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "docker_hub_token",
    description: "Container registry token",
    env: "DOCKER_HUB_TOKEN",
    aliases: [],
    parameter: "docker_hub_token",
    secure: true,
    required: false,
    kind: "value",
  },
  {
    key: "github_username",
    description: "Source control username",
    env: "GITHUB_USERNAME",
    aliases: [],
    parameter: "github_username",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "github_token",
    description: "Source control token",
    env: "GITHUB_TOKEN",
    aliases: [],
    parameter: "github_token",
    secure: true,
    required: false,
    kind: "value",
  },
  {
    key: "github_repo",
    description: "Source repository URL",
    env: "GITHUB_REPO",
    aliases: [],
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "jira_url",
    description: "Issue tracker URL",
    env: "JIRA_URL",
    aliases: [],
    parameter: "jira_url",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "jira_email",
    description: "Issue tracker account email",
    env: "JIRA_EMAIL",
    aliases: [],
    parameter: "jira_email",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "jira_api_token",
    description: "Issue tracker API token",
    env: "JIRA_API_TOKEN",
    aliases: [],
    parameter: "jira_api_token",
    secure: true,
    required: false,
    kind: "value",
  },
  {
    key: "jira_project_key",
    description: "Issue tracker project key",
    env: "JIRA_PROJECT_KEY",
    aliases: [],
    secure: false,
    required: false,
    kind: "value",
    default: "CICD",
  },
  {
    key: "jenkins_admin_user",
    description: "CI server admin user",
    env: "JENKINS_ADMIN_USER",
    aliases: [],
    secure: false,
    required: false,
    kind: "value",
    default: "admin",
  },
  {
    key: "jenkins_admin_password",
    description: "CI server admin password",
    env: "JENKINS_ADMIN_PASSWORD",
    aliases: [],
    parameter: "jenkins_password",
    secure: true,
    required: false,
    kind: "value",
  },
  {
    key: "ssh_private_key_path",
    description: "Path to the SSH private key used to reach targets",
    env: "SSH_KEY_PATH",
    aliases: [],
    parameter: "ssh_key_path",
    secure: false,
    required: true,
    kind: "path",
    ansibleVar: "ansible_ssh_private_key_file",
  },
  {
    key: "ssh_private_key_b64",
    description: "SSH private key material, base64 encoded",
    env: "SSH_PRIVATE_KEY_B64",
    aliases: [],
    parameter: "ssh_private_key",
    secure: true,
    required: false,
    kind: "value",
  },
  {
    key: "notification_email",
    description: "Address that receives pipeline notifications",
    env: "NOTIFICATION_EMAIL",
    aliases: ["owner_email"],
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "smtp_host",
    description: "SMTP server host",
    env: "SMTP_HOST",
    aliases: [],
    parameter: "smtp_host",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "smtp_port",
    description: "SMTP server port",
    env: "SMTP_PORT",
    aliases: [],
    parameter: "smtp_port",
    secure: false,
    required: false,
    kind: "value",
    default: "587",
  },
  {
    key: "smtp_username",
    description: "SMTP auth username",
    env: "SMTP_USERNAME",
    aliases: [],
    parameter: "smtp_username",
    secure: false,
    required: false,
    kind: "value",
  },
  {
    key: "smtp_password",
    description: "SMTP auth password",
    env: "SMTP_PASSWORD",
    aliases: [],
    parameter: "smtp_password",
    secure: true,
    required: false,
    kind: "value",
  },
];

/** Every name a source may use for a definition, catalog key first. */
export function namesFor(def: CredentialDefinition): string[] {
  return [def.key, def.env, ...def.aliases];
}

/** Find the definition a (possibly aliased) name refers to. */
export function findDefinition(
  catalog: readonly CredentialDefinition[],
  name: string,
): CredentialDefinition | undefined {
  return catalog.find((def) => namesFor(def).includes(name));
}
