/**
 * What the launch validator needs from the incoming launch POST.
 */
export interface LaunchRequest {
  /** The posted id_token form field */
  idToken?: string;
  /** The posted state form field */
  state?: string;
  /** Cookies sent with the request, by name */
  cookies: Record<string, string | undefined>;
  signal?: AbortSignal;
}
