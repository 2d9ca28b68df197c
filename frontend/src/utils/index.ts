// Check if the code is running in a browser environment
export const isBrowser = typeof window !== "undefined";

// Class providing utility functions for local storage
export class LocalStorage {
    // Get value from local storage
    static get(key: string): unknown {
        if (!isBrowser) return null;
        const value = localStorage.getItem(key);
        if (value) {
            try {
                return JSON.parse(value);
            } catch (err) {
                return null;
            }
        }
        return null;
    }

    // Set value in local storage
    static set(key: string, value: unknown) {
        if (!isBrowser) return;
        localStorage.setItem(key, JSON.stringify(value));
    }
}

// "http://host:8000//" -> "http://host:8000"
export function normalizeBaseUrl(url: string): string {
    return url.trim().replace(/\/+$/, "");
}
