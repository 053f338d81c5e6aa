// Keep the host environment from switching on stack configuration during tests
for (const key of Object.keys(process.env)) {
  if (key.startsWith('TAGGEDSTACK_') || key.startsWith('CONCURRENTTAGGEDSTACK_')) {
    delete process.env[key];
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});
