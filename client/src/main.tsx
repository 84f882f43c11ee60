import React from 'react';
import { createRoot } from 'react-dom/client';
import EmailGenerator from './components/EmailGenerator.js';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
    <React.StrictMode>
        <EmailGenerator />
    </React.StrictMode>,
);
