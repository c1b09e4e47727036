/**
 * API Key Types
 * Keys identify the calling company at the HTTP gateway
 */

export interface ApiKey {
  id: string;
  companyId: string;
  label: string;
}
