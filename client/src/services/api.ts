import axios from 'axios';
import type { GenerateEmailRequest } from '../types/index.js';

export const DEFAULT_API_URL = import.meta.env.VITE_API_URL || 'http://localhost:9090';

function describeApiError(error: unknown): string {
    if (axios.isAxiosError(error) && error.response) {
        const { status, data } = error.response;
        const fallback = `HTTP error! Status: ${status}`;
        if (typeof data !== 'string') return fallback;
        try {
            const body: unknown = JSON.parse(data);
            if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
                return body.error;
            }
            return fallback;
        } catch {
            return fallback;
        }
    }
    return error instanceof Error ? error.message : String(error);
}

// The server answers with the extracted reply as plain text; it is not parsed here.
export const generateEmail = async (request: GenerateEmailRequest, apiUrl: string = DEFAULT_API_URL): Promise<string> => {
    try {
        const response = await axios.post<string>(`${apiUrl}/api/email/generate`, request, { responseType: 'text' });
        return response.data;
    } catch (error) {
        console.error('Error generating email:', describeApiError(error));
        throw error;
    }
};
