/**
 * Some calendar hosts block datacenter IPs. With `proxy: true` every feed is
 * requested from PROXY_URL instead, with the feed's address in its `url`
 * query parameter.
 */

export type FetchFn = (url: string | URL, init?: RequestInit) => Promise<Response>;

type Env = Record<string, string | undefined>;

// Query parameters already on the endpoint (an access token, say) are kept
export function proxiedUrl(target: string | URL, endpoint: string): string {
    const proxied = new URL(endpoint);
    proxied.searchParams.set("url", target.toString());
    return proxied.toString();
}

const directFetch: FetchFn = (url, init) => fetch(url, init);

export function getFetchForConfig(config: { proxy?: boolean }, env: Env = process.env): FetchFn {
    if (!config.proxy) return directFetch;

    const endpoint = env.PROXY_URL;
    if (!endpoint) {
        console.error("Warning: proxy is enabled but PROXY_URL is not set, fetching directly");
        return directFetch;
    }
    return (url, init) => fetch(proxiedUrl(url, endpoint), init);
}
