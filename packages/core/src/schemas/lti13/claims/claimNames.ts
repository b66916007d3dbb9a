export const LTI_VERSION = '1.3.0';
export const RESOURCE_LINK_MESSAGE_TYPE = 'LtiResourceLinkRequest';

export const MESSAGE_TYPE_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/message_type';
export const VERSION_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/version';
export const DEPLOYMENT_ID_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/deployment_id';
export const TARGET_LINK_URI_CLAIM =
  'https://purl.imsglobal.org/spec/lti/claim/target_link_uri';
export const RESOURCE_LINK_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/resource_link';
export const CONTEXT_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/context';
export const ROLES_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/roles';
export const CUSTOM_CLAIM = 'https://purl.imsglobal.org/spec/lti/claim/custom';
export const AGS_ENDPOINT_CLAIM = 'https://purl.imsglobal.org/spec/lti-ags/claim/endpoint';
export const NRPS_CLAIM = 'https://purl.imsglobal.org/spec/lti-nrps/claim/namesroleservice';
