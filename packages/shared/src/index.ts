// 导出所有类型
export * from './types';

// 配置与错误
export * from './config';
export * from './errors';

// 导出加密模块
export * from './crypto';

// 信封编解码
export * from './envelope';

// 构建期加密
export * from './build';

// 运行时门禁
export * from './gate';

// 内容校验与安全渲染
export * from './content';
export * from './render';
