export interface CloudEnvironment {
  readonly name: string;
  readonly resourceManagerEndpoint: string;
  readonly activeDirectoryEndpoint: string;
  readonly serviceManagementEndpoint: string;
  readonly graphEndpoint: string;
  readonly keyVaultEndpoint: string;
}

export const AzurePublicCloud: CloudEnvironment = {
  name: "AzurePublicCloud",
  resourceManagerEndpoint: "https://management.azure.com/",
  activeDirectoryEndpoint: "https://login.microsoftonline.com/",
  serviceManagementEndpoint: "https://management.core.windows.net/",
  graphEndpoint: "https://graph.windows.net/",
  keyVaultEndpoint: "https://vault.azure.net/",
};

export const AzureChinaCloud: CloudEnvironment = {
  name: "AzureChinaCloud",
  resourceManagerEndpoint: "https://management.chinacloudapi.cn/",
  activeDirectoryEndpoint: "https://login.chinacloudapi.cn/",
  serviceManagementEndpoint: "https://management.core.chinacloudapi.cn/",
  graphEndpoint: "https://graph.chinacloudapi.cn/",
  keyVaultEndpoint: "https://vault.azure.cn/",
};

export const AzureUSGovernmentCloud: CloudEnvironment = {
  name: "AzureUSGovernmentCloud",
  resourceManagerEndpoint: "https://management.usgovcloudapi.net/",
  activeDirectoryEndpoint: "https://login.microsoftonline.us/",
  serviceManagementEndpoint: "https://management.core.usgovcloudapi.net/",
  graphEndpoint: "https://graph.windows.net/",
  keyVaultEndpoint: "https://vault.usgovcloudapi.net/",
};

export const AzureGermanCloud: CloudEnvironment = {
  name: "AzureGermanCloud",
  resourceManagerEndpoint: "https://management.microsoftazure.de/",
  activeDirectoryEndpoint: "https://login.microsoftonline.de/",
  serviceManagementEndpoint: "https://management.core.cloudapi.de/",
  graphEndpoint: "https://graph.cloudapi.de/",
  keyVaultEndpoint: "https://vault.microsoftazure.de/",
};

const environmentsByName: Record<string, CloudEnvironment> = {
  AZURECLOUD: AzurePublicCloud,
  AZUREPUBLICCLOUD: AzurePublicCloud,
  AZURECHINACLOUD: AzureChinaCloud,
  AZUREUSGOVERNMENT: AzureUSGovernmentCloud,
  AZUREUSGOVERNMENTCLOUD: AzureUSGovernmentCloud,
  AZUREGERMANCLOUD: AzureGermanCloud,
};

export function environmentFromName(name: string): CloudEnvironment {
  const environment = environmentsByName[name.trim().toUpperCase()];
  if (!environment) {
    throw new Error(`Unknown Azure cloud environment: "${name}"`);
  }
  return environment;
}
