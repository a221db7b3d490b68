// 单元测试不依赖本机凭据或配置目录：清除从 shell 继承的 BFL_* 变量
const inherited = Object.keys(process.env).filter((key) => key.startsWith('BFL_'));
for (const key of inherited) {
  delete process.env[key];
}
if (inherited.length) {
  // eslint-disable-next-line no-console
  console.warn(`[tests] Ignoring env vars: ${inherited.join(', ')}`);
}
