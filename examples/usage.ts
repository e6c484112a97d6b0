import {
  AuthenticationError,
  RateLimitError,
  createTranslationClient,
  withTranslationClient,
} from '../src';

const translator = createTranslationClient({
  apiKey: process.env.TRANSLATION_API_KEY ?? '',
  timeout: 10000,
  maxRetries: 3,
});

async function translateExample() {
  try {
    const greeting = await translator.translate('Hello, world!', { target: 'nl' });
    console.log('Translation:', greeting.text, `(from ${greeting.source})`);

    const lines = await translator.translate(['Good morning', 'Good night'], {
      target: 'de',
      source: 'en',
    });
    lines.forEach((line, index) => console.log(`Line ${index + 1}:`, line.text));

    const html = await translator.translate('<p>Welcome <b>back</b></p>', { target: 'fr', format: 'html' });
    console.log('HTML:', html.text);
  } catch (error) {
    if (error instanceof RateLimitError) {
      console.error(`Rate limited, retry in ${error.retryAfter ?? 'a few'} seconds`);
    } else if (error instanceof AuthenticationError) {
      console.error('Check TRANSLATION_API_KEY:', error.message);
    } else {
      console.error('Error translating:', error);
    }
  }
}

async function detectExample() {
  try {
    const detection = await translator.detect('Dit is een Nederlandse zin.');
    console.log('Detected:', detection.language, detection.confidence);
  } catch (error) {
    console.error('Error detecting language:', error);
  }
}

async function languagesExample() {
  const languages = await withTranslationClient(
    { apiKey: process.env.TRANSLATION_API_KEY ?? '' },
    (client) => client.languages('en')
  );
  console.log(`Supported languages (${languages.length}):`);
  languages.slice(0, 10).forEach((language) => console.log(`  ${language.code}: ${language.name ?? '?'}`));
}

async function main() {
  await translateExample();
  await detectExample();
  translator.close();
  await languagesExample();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
