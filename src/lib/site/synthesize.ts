import { extractSeoMetadata } from "./seo";

export const DEFAULT_ACCENT_COLOR = "#DC143C";

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

// The accent lands inside a <style> block, so only #rgb / #rrggbb get through
export function resolveAccentColor(color: string | undefined): string {
  return color && isHexColor(color) ? color : DEFAULT_ACCENT_COLOR;
}

// Fixed style tokens; transformations search for these literals
export const BASE_BACKGROUND = "#0b0b10";
export const GLOW_COLOR = "rgba(99,102,241,0.15)";
export const MARKETING_PHRASE = "Production-ready";
export const MAIN_CLOSE = "</main>";

const SCENE_URL = "https://prod.spline.design/4cHQr84zOGAHOehh/scene.splinecode";

interface Block {
  title: string;
  body: string;
}

const FEATURES: Block[] = [
  { title: "Instant Preview", body: "Your site renders as you describe it. No waiting, no compiling." },
  { title: "Clean Code", body: "Accessible, semantic HTML with responsive layouts out of the box." },
  { title: "SEO Ready", body: "Meta tags, performance hints, and fast loading by default." },
];

const TEMPLATE_CARDS: Array<Block & { seed: string }> = [
  { seed: "hero", title: "Hero + CTA", body: "Crisp hero section with strong call-to-action." },
  { seed: "feature", title: "Feature Grid", body: "Explain value with icons and concise text." },
  { seed: "contact", title: "Contact Form", body: "Accessible form with client-side validation." },
];

const FIELD_CLASS =
  "w-full mt-1 p-3 rounded-lg bg-white/10 border border-white/10 outline-none focus:border-white/30";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function renderStyles(accentColor: string): string {
  return `    <style>
      :root { --accent: ${accentColor}; }
      html, body { height: 100%; }
      body { font-family: 'Inter', system-ui, -apple-system, Segoe UI, Roboto, sans-serif; }
      .crimson-gradient { background: radial-gradient(1200px 600px at 50% -20%, rgba(220,20,60,0.25), transparent),
                          radial-gradient(800px 400px at 120% 20%, ${GLOW_COLOR}, transparent),
                          ${BASE_BACKGROUND}; }
      .glass { backdrop-filter: blur(12px); background: rgba(255,255,255,0.06); border: 1px solid rgba(255,255,255,0.08); }
      .btn { background: var(--accent); color: white; box-shadow: 0 10px 30px rgba(220,20,60,0.35); }
      .btn:hover { filter: brightness(1.05); transform: translateY(-1px); }
    </style>`;
}

function renderHeader(): string {
  return `    <header class="sticky top-0 z-50 border-b border-white/10 bg-black/30 backdrop-blur">
      <div class="max-w-7xl mx-auto px-6 py-4 flex items-center justify-between">
        <a href="#" class="font-extrabold tracking-tight text-xl">Crimson</a>
        <nav class="hidden md:flex gap-8 text-white/80">
          <a href="#features" class="hover:text-white transition">Features</a>
          <a href="#templates" class="hover:text-white transition">Templates</a>
          <a href="#contact" class="hover:text-white transition">Contact</a>
        </nav>
        <a href="#cta" class="btn px-4 py-2 rounded-lg font-semibold">Get Started</a>
      </div>
    </header>`;
}

function renderHero(heading: string): string {
  return `    <section class="relative" aria-label="Hero">
      <div class="absolute inset-0 opacity-80" style="pointer-events:none">
        <iframe src="${SCENE_URL}" title="AI Aura" style="width:100%;height:100%;border:0;"></iframe>
      </div>
      <div class="relative z-10 max-w-5xl mx-auto px-6 pt-28 pb-24 text-center">
        <h1 class="text-4xl md:text-6xl font-extrabold leading-tight">${heading}</h1>
        <p class="mt-6 text-white/80 text-lg md:text-xl">${MARKETING_PHRASE} site generated instantly. Clean, accessible, responsive, and fast.</p>
        <div class="mt-10 flex items-center justify-center gap-4" id="cta">
          <a href="#contact" class="btn px-6 py-3 rounded-xl font-semibold">Start Now</a>
          <a href="#features" class="px-6 py-3 rounded-xl font-semibold glass">Explore Features</a>
        </div>
      </div>
    </section>`;
}

function renderFeatures(): string {
  const blocks = FEATURES.map(
    ({ title, body }) => `        <div class="glass rounded-2xl p-6">
          <h3 class="text-xl font-bold">${title}</h3>
          <p class="text-white/80 mt-2">${body}</p>
        </div>`
  ).join("\n");

  return `      <section id="features" class="max-w-6xl mx-auto px-6 py-20 grid md:grid-cols-3 gap-6">
${blocks}
      </section>`;
}

function renderTemplates(): string {
  const cards = TEMPLATE_CARDS.map(
    ({ seed, title, body }) => `          <article class="glass rounded-xl overflow-hidden">
            <img src="https://picsum.photos/seed/${seed}/800/500" alt="Placeholder image" class="w-full h-40 object-cover" />
            <div class="p-5">
              <h3 class="font-semibold">${title}</h3>
              <p class="text-white/80 text-sm mt-1">${body}</p>
            </div>
          </article>`
  ).join("\n");

  return `      <section id="templates" class="max-w-6xl mx-auto px-6 pb-24">
        <h2 class="text-2xl font-bold mb-6">Featured Sections</h2>
        <div class="grid md:grid-cols-3 gap-6">
${cards}
        </div>
      </section>`;
}

function renderContact(): string {
  return `      <section id="contact" class="max-w-2xl mx-auto px-6 pb-24">
        <div class="glass rounded-2xl p-8">
          <h2 class="text-2xl font-bold">Get in touch</h2>
          <form class="mt-6 grid gap-4" onsubmit="event.preventDefault(); alert('Submitted!')">
            <div>
              <label class="block text-sm text-white/70">Name</label>
              <input class="${FIELD_CLASS}" required />
            </div>
            <div>
              <label class="block text-sm text-white/70">Email</label>
              <input type="email" class="${FIELD_CLASS}" required />
            </div>
            <div>
              <label class="block text-sm text-white/70">Message</label>
              <textarea rows="4" class="${FIELD_CLASS}" required></textarea>
            </div>
            <button class="btn px-5 py-3 rounded-xl font-semibold">Send</button>
          </form>
        </div>
      </section>`;
}

/**
 * Render the complete single-file site for a prompt.
 *
 * Output is deterministic except for the footer year. Asset URLs (fonts,
 * Tailwind CDN, 3D scene, placeholder images) are literal references and are
 * never fetched here.
 */
export function synthesizeDocument(prompt: string, accentColor: string = DEFAULT_ACCENT_COLOR): string {
  const seo = extractSeoMetadata(prompt);
  const year = new Date().getFullYear();

  return `
<!doctype html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${escapeHtml(seo.title)}</title>
    <meta name="description" content="${escapeHtml(seo.description)}" />
    <meta name="keywords" content="${escapeHtml(seo.keywords)}" />
    <link rel="preconnect" href="https://fonts.googleapis.com" />
    <link rel="preconnect" href="https://fonts.gstatic.com" crossorigin />
    <link href="https://fonts.googleapis.com/css2?family=Inter:wght@300;400;600;800&display=swap" rel="stylesheet" />
    <script src="https://cdn.tailwindcss.com"></script>
${renderStyles(resolveAccentColor(accentColor))}
  </head>
  <body class="min-h-full crimson-gradient text-white">
${renderHeader()}

${renderHero(escapeHtml(prompt))}

    <main class="relative z-10">
${renderFeatures()}

${renderTemplates()}

${renderContact()}
    ${MAIN_CLOSE}

    <footer class="border-t border-white/10 py-10 text-center text-white/60">
      <p>© ${year} Crimson — Generated by natural language</p>
    </footer>
  </body>
</html>
`;
}
