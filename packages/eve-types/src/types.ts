/**
 * A generic branded type that adds a readonly brand property to any type T.
 * This pattern helps prevent accidental mixing of different ID types by making
 * them structurally different at the type level while maintaining the same runtime value.
 *
 * @template T - The underlying type to brand
 * @template Brand - The string literal type used as the brand identifier
 *
 * @example
 * ```typescript
 * type SkillId = EveBrandedType<number, 'SkillId'>;
 * type CertificateId = EveBrandedType<number, 'CertificateId'>;
 *
 * // These are incompatible even though both are numbers:
 * const skillId: SkillId = 3300 as SkillId;
 * const certificateId: CertificateId = 3300 as CertificateId;
 * // skillId = certificateId; // TypeScript error
 * ```
 */
export type EveBrandedType<T, Brand extends string> = T & { readonly __brand: Brand }

/**
 * Utility function for creating branded types.
 *
 * The __brand property exists only at the type level, so branding a number
 * costs nothing at runtime.
 *
 * @param value - The value to brand
 * @param _brand - The brand identifier string (used only for type inference)
 */
export const brand = <T, Brand extends string>(
	value: T,
	_brand: Brand
): EveBrandedType<T, Brand> => {
	// The __brand property is a type-level construct only
	return value as EveBrandedType<T, Brand>
}

/**
 * Utility function for extracting the underlying value from a branded type.
 *
 * @example
 * ```typescript
 * const branded: EveCorporationId = createEveCorporationId(98000001);
 * const raw: number = unbrand(branded); // 98000001
 * ```
 */
export const unbrand = <T, Brand extends string>(value: EveBrandedType<T, Brand>): T => {
	return value as T
}
