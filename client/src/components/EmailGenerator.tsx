import React, { useCallback, useState } from 'react';
import { useCopyToClipboard } from '../hooks/useCopyToClipboard.js';
import { canSubmit, useEmailGenerator } from '../hooks/useEmailGenerator.js';
import { generateEmail } from '../services/api.js';
import { TONES, type GenerateEmailRequest, type Tone } from '../types/index.js';

export interface EmailGeneratorProps {
    apiUrl?: string;
}

function toneLabel(tone: Tone) {
    return tone.charAt(0).toUpperCase() + tone.slice(1);
}

export default function EmailGenerator({ apiUrl }: EmailGeneratorProps) {
    const [emailContent, setEmailContent] = useState<string>('');
    const [tone, setTone] = useState<Tone>('formal');

    const generate = useCallback((request: GenerateEmailRequest) => generateEmail(request, apiUrl), [apiUrl]);
    const { state, submit, isLoading } = useEmailGenerator(generate);
    const { copy, reset: resetCopy, isCopied } = useCopyToClipboard();

    const handleGenerate = () => {
        resetCopy();
        void submit({ emailContent, tone });
    };

    const handleToneChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
        const next = TONES.find((t) => t === e.target.value);
        if (next) setTone(next);
    };

    return (
        <div className="flex flex-col items-center justify-center min-h-screen bg-gray-100 p-4 font-sans">
            <div className="bg-white p-6 sm:p-8 rounded-xl shadow-lg w-full max-w-2xl">
                <h1 className="text-3xl font-bold text-center text-gray-800 mb-6">Email Generator</h1>

                <div className="space-y-4 mb-6">
                    <div>
                        <label htmlFor="emailContent" className="block text-gray-700 font-medium mb-1">Email Content</label>
                        <textarea
                            id="emailContent"
                            className="w-full p-3 border border-gray-300 rounded-lg resize-none"
                            rows={6}
                            value={emailContent}
                            onChange={(e) => setEmailContent(e.target.value)}
                            placeholder="Paste the email you want to reply to..."
                        />
                    </div>
                    <div>
                        <label htmlFor="tone" className="block text-gray-700 font-medium mb-1">Select Tone</label>
                        <select
                            id="tone"
                            className="w-full p-3 border border-gray-300 rounded-lg"
                            value={tone}
                            onChange={handleToneChange}
                        >
                            {TONES.map((t) => (
                                <option key={t} value={t}>{toneLabel(t)}</option>
                            ))}
                        </select>
                    </div>
                </div>

                <button
                    className="w-full p-3 bg-blue-600 hover:bg-blue-700 text-white font-semibold rounded-lg disabled:bg-gray-400 disabled:cursor-not-allowed"
                    onClick={handleGenerate}
                    disabled={!canSubmit(state, emailContent)}
                >
                    {isLoading ? 'Generating...' : 'Generate Email'}
                </button>

                {state.status === 'error' && (
                    <div role="alert" className="mt-4 p-4 bg-red-100 text-red-700 rounded-lg border border-red-200">
                        <p>{state.message}</p>
                    </div>
                )}

                {state.status === 'success' && (
                    <div className="mt-8">
                        <h2 className="text-xl font-bold text-gray-800 mb-4">Generated Output</h2>
                        <div className="bg-gray-50 p-4 sm:p-6 rounded-lg border border-gray-200">
                            <p data-testid="generated-email" className="text-gray-700 whitespace-pre-wrap">{state.text}</p>
                        </div>
                        <button
                            className="mt-4 w-full p-3 bg-green-600 hover:bg-green-700 text-white font-semibold rounded-lg"
                            onClick={() => copy(state.text)}
                        >
                            {isCopied ? 'Copied!' : 'Copy Output'}
                        </button>
                    </div>
                )}
            </div>
        </div>
    );
}
