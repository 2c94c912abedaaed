import { describe, expect, it } from 'vitest';
import { extractMainText } from './content-extractor';

describe('extractMainText', () => {
    it('drops page chrome and collapses whitespace', () => {
        const html = `<html>
            <head><title>Ignored</title><style>p { color: red; }</style></head>
            <body>
                <header>Logo</header>
                <nav>Home | About</nav>
                <main><h1>Title</h1>
                    <p>Some   text</p></main>
                <script>var tracking = 1;</script>
                <footer>Copyright</footer>
            </body>
        </html>`;

        expect(extractMainText(html)).toBe('Title Some text');
    });

    it('reads the text of a bare fragment', () => {
        expect(extractMainText('<p>Hello\n\tworld</p>')).toBe('Hello world');
    });

    it('returns an empty string for markup without text', () => {
        expect(extractMainText('<html><body><script>x()</script></body></html>')).toBe('');
    });

    it('is deterministic for the same markup', () => {
        const html = '<body><article>Same <b>content</b></article></body>';
        expect(extractMainText(html)).toBe(extractMainText(html));
        expect(extractMainText(html)).toBe('Same content');
    });
});
