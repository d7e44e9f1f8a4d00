/**
 * @fileoverview Builder contract
 *
 * Builders accumulate fields through chained setters and commit nothing
 * until `build()`. `build()` checks required fields in declaration order,
 * then runs field validators in declaration order, and throws the first
 * violation it finds. A built object never carries server-assigned fields.
 *
 * @module @confrest/core/contracts/Builder
 */

/**
 * Fluent, validating constructor for an entity type.
 *
 * @typeParam T - The entity the builder produces
 *
 * @example
 * ```typescript
 * const hashtag = Hashtag.builder()
 *     .name("web")
 *     .description("Web servers")
 *     .build();
 * ```
 */
export interface Builder<T> {
    /** Set the display name */
    name(name: string): this;

    /**
     * Validate and construct the entity.
     *
     * @throws ConfigError subclass for the first violated rule
     */
    build(): T;
}

/**
 * Default `minimal(name)`: the smallest valid entity, built from a name only.
 */
export function minimalFromBuilder<T>(builder: Builder<T>, name: string): T {
    return builder.name(name).build();
}
