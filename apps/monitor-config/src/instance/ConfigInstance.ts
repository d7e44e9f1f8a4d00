/**
 * @fileoverview Configuration instance
 *
 * A point-in-time copy of every supported entity type on one server.
 * Refreshing issues one paginated fetch-all per type, all concurrently;
 * a single failure rejects the whole refresh and the previous instance
 * stays as it was.
 *
 * Refreshing walks every collection on the server and can put noticeable
 * load on it.
 *
 * @module instance/ConfigInstance
 */

import {
    ConfigObjectMap,
    defaultLogger,
    type ClientLogger,
    type ConfigClient,
    type WireObject,
} from "@confrest/core";
import {
    BSMComponent,
    Hashtag,
    Host,
    HostGroup,
    HostTemplate,
} from "../domain/index.js";

/**
 * One collection per entity type.
 */
export interface ConfigInstanceCollections {
    readonly bsmComponents: ConfigObjectMap<BSMComponent>;
    readonly hashtags: ConfigObjectMap<Hashtag>;
    readonly hostGroups: ConfigObjectMap<HostGroup>;
    readonly hostTemplates: ConfigObjectMap<HostTemplate>;
    readonly hosts: ConfigObjectMap<Host>;
}

export type ConfigInstanceCounts = { readonly [K in keyof ConfigInstanceCollections]: number };

/**
 * @example
 * ```typescript
 * const instance = await ConfigInstance.empty().refresh(client);
 * console.log(instance.counts());
 * // { bsmComponents: 4, hashtags: 12, hostGroups: 9, hostTemplates: 31, hosts: 210 }
 * ```
 */
export class ConfigInstance implements ConfigInstanceCollections {
    readonly bsmComponents: ConfigObjectMap<BSMComponent>;
    readonly hashtags: ConfigObjectMap<Hashtag>;
    readonly hostGroups: ConfigObjectMap<HostGroup>;
    readonly hostTemplates: ConfigObjectMap<HostTemplate>;
    readonly hosts: ConfigObjectMap<Host>;

    constructor(collections: ConfigInstanceCollections) {
        this.bsmComponents = collections.bsmComponents;
        this.hashtags = collections.hashtags;
        this.hostGroups = collections.hostGroups;
        this.hostTemplates = collections.hostTemplates;
        this.hosts = collections.hosts;
    }

    static empty(): ConfigInstance {
        return new ConfigInstance({
            bsmComponents: new ConfigObjectMap<BSMComponent>(),
            hashtags     : new ConfigObjectMap<Hashtag>(),
            hostGroups   : new ConfigObjectMap<HostGroup>(),
            hostTemplates: new ConfigObjectMap<HostTemplate>(),
            hosts        : new ConfigObjectMap<Host>(),
        });
    }

    /**
     * Fetch every collection again and return a new instance.
     *
     * @throws The first error raised by any of the fetches
     */
    async refresh(client: ConfigClient, logger: ClientLogger = defaultLogger): Promise<ConfigInstance> {
        logger.info("Refreshing configuration instance");

        const [bsmComponents, hashtags, hostGroups, hostTemplates, hosts] = await Promise.all([
            client.getAllObjectConfigs(BSMComponent),
            client.getAllObjectConfigs(Hashtag),
            client.getAllObjectConfigs(HostGroup),
            client.getAllObjectConfigs(HostTemplate),
            client.getAllObjectConfigs(Host),
        ]);

        const refreshed = new ConfigInstance({ bsmComponents, hashtags, hostGroups, hostTemplates, hosts });
        logger.info("Configuration instance refreshed", refreshed.counts());
        return refreshed;
    }

    counts(): ConfigInstanceCounts {
        return {
            bsmComponents: this.bsmComponents.size,
            hashtags     : this.hashtags.size,
            hostGroups   : this.hostGroups.size,
            hostTemplates: this.hostTemplates.size,
            hosts        : this.hosts.size,
        };
    }

    /**
     * Snapshot in wire format, one array per entity type.
     */
    toJSON(): WireObject {
        return {
            bsmcomponents: this.bsmComponents.toJSON(),
            hashtags     : this.hashtags.toJSON(),
            hostgroups   : this.hostGroups.toJSON(),
            hosttemplates: this.hostTemplates.toJSON(),
            hosts        : this.hosts.toJSON(),
        };
    }
}
