/**
 * @fileoverview Domain utilities barrel exports
 *
 * @module domain/utils
 */

export {
    validateHashtagName,
    validateHostName,
    validateHostGroupName,
    validateHostTemplateName,
    validateBsmComponentName,
    validateManagementUrlName,
    validateDescription,
    validateUrl,
    validateIpOrHostname,
    validateQuorum,
} from "./validators.js";
