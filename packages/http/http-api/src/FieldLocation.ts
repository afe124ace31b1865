/**
 * Location markers accepted in field declarations.
 * A field declared without a marker goes to the JSON body.
 */
export const LOCATION_MARKERS = ['path', 'query', 'query_map', 'header', 'body', 'newtype_body'] as const;
export type LocationMarker = (typeof LOCATION_MARKERS)[number];

/**
 * Where a field lives on the wire. One variant per field, so a field can never
 * be in two places at once.
 */
export type FieldLocation =
    | { readonly kind: 'path' }
    | { readonly kind: 'query'; readonly key: string }
    | { readonly kind: 'queryMap' }
    | { readonly kind: 'header'; readonly headerName: string }
    | { readonly kind: 'body'; readonly key: string }
    | { readonly kind: 'newtypeBody' };

export type FieldLocationKind = FieldLocation['kind'];

export function isLocationMarker(value: string): value is LocationMarker {
    return LOCATION_MARKERS.some((m) => m === value);
}

/**
 * Human readable name of a location, used in diagnostics.
 */
export function describeLocation(location: FieldLocation): string {
    switch (location.kind) {
        case 'path':
            return 'path';
        case 'query':
            return `query "${location.key}"`;
        case 'queryMap':
            return 'query map';
        case 'header':
            return `header "${location.headerName}"`;
        case 'body':
            return `body "${location.key}"`;
        case 'newtypeBody':
            return 'newtype body';
    }
}
