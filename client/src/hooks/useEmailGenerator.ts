import { useCallback, useReducer, useRef } from 'react';
import { generateEmail } from '../services/api.js';
import type { GenerateEmailRequest, InteractionState } from '../types/index.js';

export const GENERATION_FAILED_MESSAGE =
    'Failed to generate email. Please check your network and ensure the local API is running.';

export type InteractionAction =
    | { type: 'submit' }
    | { type: 'succeed'; text: string }
    | { type: 'fail'; message: string };

const IDLE: InteractionState = { status: 'idle' };

export function interactionReducer(state: InteractionState, action: InteractionAction): InteractionState {
    switch (action.type) {
        case 'submit':
            return state.status === 'loading' ? state : { status: 'loading' };
        case 'succeed':
            return state.status === 'loading' ? { status: 'success', text: action.text } : state;
        case 'fail':
            return state.status === 'loading' ? { status: 'error', message: action.message } : state;
    }
}

export function canSubmit(state: InteractionState, emailContent: string): boolean {
    return emailContent.length > 0 && state.status !== 'loading';
}

export type GenerateFn = (request: GenerateEmailRequest) => Promise<string>;

export function useEmailGenerator(generate: GenerateFn = generateEmail) {
    const [state, dispatch] = useReducer(interactionReducer, IDLE);
    // Guards against a second submit landing before the loading render.
    const inFlight = useRef(false);

    const submit = useCallback(async (request: GenerateEmailRequest) => {
        if (inFlight.current || !request.emailContent) return;
        inFlight.current = true;
        dispatch({ type: 'submit' });
        try {
            const text = await generate(request);
            dispatch({ type: 'succeed', text });
        } catch (err) {
            console.error('Failed to generate email:', err);
            dispatch({ type: 'fail', message: GENERATION_FAILED_MESSAGE });
        } finally {
            inFlight.current = false;
        }
    }, [generate]);

    return { state, submit, isLoading: state.status === 'loading' };
}
