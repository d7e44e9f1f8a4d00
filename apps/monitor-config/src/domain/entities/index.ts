/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    Hashtag,
    HashtagBuilder,
    HASHTAG_STYLES,
    type HashtagStyle,
    type HashtagProps,
} from "./Hashtag.js";
export {
    HostGroup,
    HostGroupBuilder,
    type HostGroupProps,
} from "./HostGroup.js";
export { HostGroupRef } from "./HostGroupRef.js";
export {
    Host,
    HostBuilder,
    type HostProps,
} from "./Host.js";
export { HostRef } from "./HostRef.js";
export {
    HostTemplate,
    HostTemplateBuilder,
    type HostTemplateProps,
} from "./HostTemplate.js";
export { HostTemplateRef } from "./HostTemplateRef.js";
export {
    ManagementUrl,
    ManagementUrlBuilder,
    type ManagementUrlProps,
} from "./ManagementUrl.js";
export {
    BSMComponent,
    BSMComponentBuilder,
    type BSMComponentProps,
} from "./BSMComponent.js";
