// Requests go through injected transports; a stray fetch fails loudly
global.fetch = jest.fn(() =>
  Promise.reject(new Error('fetch not mocked for this test'))
);

// Silence [ULink] debug output and misuse warnings
jest.spyOn(console, 'warn').mockImplementation(() => {});
jest.spyOn(console, 'log').mockImplementation(() => {});
