import {
  Project,
  Scope,
  VariableDeclarationKind,
  type CodeBlockWriter,
  type JSDocStructure,
  type OptionalKind,
  type ParameterDeclarationStructure,
  type SourceFile,
} from 'ts-morph';
import { isSuccessStatus, DEFAULT_TAG } from './operations.js';
import { TypePrinter, decoderName, encoderName } from './type-printer.js';
import type {
  AuthDescriptor,
  EnumType,
  GeneratedPackage,
  ObjectType,
  Operation,
  ResolvedTypes,
  ResponseDescriptor,
  SpecInfo,
  TypeRef,
} from './types.js';
import { JSDocUtils } from './utils/jsdoc.js';
import { NameRegistry, toPropertyName } from './utils/naming.js';

/** Names `client.ts` always exports; they are claimed before any schema is named. */
export const CLIENT_EXPORTS = ['ApiError', 'ApiRequest', 'HeaderProvider', 'RequestOptions'];

/** Members of the generated client class that a tag accessor must not overwrite. */
const CLIENT_MEMBERS = ['axios', 'options', 'send', 'fail'];

const AXIOS_VERSION = '^1.7.0';

export interface ComposeContext {
  packageName: string;
  clientClassName: string;
  info: SpecInfo;
  baseUrl?: string;
  /** The global type-name scope shared with the resolver and the extractor. */
  names: NameRegistry;
}

interface TagUnit {
  tag: string;
  moduleName: string;
  className: string;
  accessor: string;
  operations: Operation[];
}

type ApiKeyDescriptor = Extract<AuthDescriptor, { strategy: 'api_key' }>;

interface AuthOptions {
  apiKeys: Array<ApiKeyDescriptor & { optionName: string }>;
  basic: Array<Extract<AuthDescriptor, { strategy: 'basic' }>>;
}

function statusClass(status: string): number | undefined {
  const match = /^([1-5])XX$/i.exec(status);
  return match ? Number(match[1]) : undefined;
}

function docs(description: string | undefined): OptionalKind<JSDocStructure>[] | undefined {
  return description ? [{ description }] : undefined;
}

function pathTemplate(operation: Operation): string {
  const byWireName = new Map(
    operation.parameters.filter(parameter => parameter.location === 'path').map(parameter => [parameter.wireName, parameter.name]),
  );
  const parts = operation.path.split(/(\{[^}]+\})/);
  const rendered = parts.map(part => {
    const placeholder = /^\{([^}]+)\}$/.exec(part);
    const variable = placeholder ? byWireName.get(placeholder[1]) : undefined;
    if (variable !== undefined) {
      return `\${encodeURIComponent(String(${variable}))}`;
    }
    return part.replace(/\\/g, '\\\\').replace(/`/g, '\\`').replace(/\$\{/g, '\\${');
  });
  return '`' + rendered.join('') + '`';
}

/**
 * Turns the resolved types, operations and auth strategies of one run into the files of a
 * TypeScript client package. The output depends on nothing but the inputs, so two runs over the
 * same document produce byte-identical packages.
 */
export class PackageComposer {
  private readonly project = new Project({ useInMemoryFileSystem: true });
  private readonly jsdoc = new JSDocUtils();

  constructor(private readonly context: ComposeContext) {}

  compose(types: ResolvedTypes, operations: readonly Operation[], auth: readonly AuthDescriptor[]): GeneratedPackage {
    const units = this.groupByTag(operations);
    const authOptions = this.authOptions(auth);

    const files = new Map<string, string>();
    files.set('index.ts', this.render('index.ts', file => this.writeIndex(file, units)));
    files.set('client.ts', this.render('client.ts', file => this.writeClient(file, units, authOptions)));
    files.set('models.ts', this.render('models.ts', file => this.writeModels(file, types, operations)));
    for (const unit of units) {
      const path = `api/${unit.moduleName}.ts`;
      files.set(path, this.render(path, file => this.writeTagModule(file, unit)));
    }
    files.set('package.json', this.packageManifest());
    files.set('README.md', this.readme(units, authOptions));
    return files;
  }

  private render(path: string, write: (file: SourceFile) => void): string {
    const file = this.project.createSourceFile(path, '', { overwrite: true });
    write(file);
    const text = file.getFullText();
    this.project.removeSourceFile(file);
    return text;
  }

  private groupByTag(operations: readonly Operation[]): TagUnit[] {
    const modules = new NameRegistry('modules');
    const accessors = new NameRegistry(`${this.context.clientClassName} members`).reserve(...CLIENT_MEMBERS);
    const units = new Map<string, TagUnit>();

    for (const operation of operations) {
      let unit = units.get(operation.tag);
      if (!unit) {
        unit = {
          tag: operation.tag,
          moduleName: modules.claim(operation.tag, 'module'),
          className: this.context.names.claim(`${operation.tag} Api`, 'class'),
          accessor: accessors.claim(operation.tag, 'variable'),
          operations: [],
        };
        units.set(operation.tag, unit);
      }
      unit.operations.push(operation);
    }
    return [...units.values()];
  }

  private authOptions(auth: readonly AuthDescriptor[]): AuthOptions {
    const options = new NameRegistry('client options').reserve('baseUrl', 'headers', 'axiosConfig', 'username', 'password');
    const result: AuthOptions = { apiKeys: [], basic: [] };
    const apiKeys = auth.filter((descriptor): descriptor is ApiKeyDescriptor => descriptor.strategy === 'api_key');

    for (const descriptor of apiKeys) {
      // A single API key scheme gets the plain `apiKey` option
      const optionName = apiKeys.length === 1 ? options.claim('api key', 'variable') : options.claim(`${descriptor.schemeName} api key`, 'variable');
      result.apiKeys.push({ ...descriptor, optionName });
    }
    for (const descriptor of auth) {
      if (descriptor.strategy === 'basic') {
        result.basic.push(descriptor);
      }
    }
    return result;
  }

  private writeModels(file: SourceFile, types: ResolvedTypes, operations: readonly Operation[]): void {
    const printer = new TypePrinter();

    for (const [name, type] of types) {
      switch (type.kind) {
        case 'object':
          this.writeObjectModel(file, printer, type);
          break;
        case 'enum':
          this.writeEnumModel(file, type);
          break;
        default:
          this.writeAliasModel(file, printer, name, type);
      }
    }

    const written = new Set<string>();
    for (const operation of operations) {
      if (operation.paramsTypeName === undefined || written.has(operation.paramsTypeName)) continue;
      written.add(operation.paramsTypeName);
      file.addInterface({
        name: operation.paramsTypeName,
        isExported: true,
        docs: docs(`Query and header parameters of ${operation.method.toUpperCase()} ${operation.path}`),
        properties: operation.parameters
          .filter(parameter => parameter.location !== 'path')
          .map(parameter => ({
            name: parameter.name,
            type: printer.typeString(parameter.type),
            hasQuestionToken: !parameter.required,
            docs: docs(parameter.description && this.jsdoc.escapeBackticks(parameter.description)),
          })),
      });
    }
  }

  private writeObjectModel(file: SourceFile, printer: TypePrinter, type: ObjectType): void {
    const fields = [...type.fields.values()];

    file.addInterface({
      name: type.name,
      isExported: true,
      docs: docs(type.doc),
      properties: fields.map(field => ({
        name: field.name,
        type: printer.typeString(field.type),
        hasQuestionToken: !type.required.has(field.name),
        docs: docs(field.doc),
      })),
    });

    file.addFunction({
      name: decoderName(type.name),
      isExported: true,
      parameters: [{ name: 'json', type: 'unknown' }],
      returnType: type.name,
      statements: writer => {
        if (fields.length === 0) {
          writer.writeLine('return {};');
          return;
        }
        writer.writeLine('const record = json as Record<string, unknown>;');
        writer.write('return ').inlineBlock(() => {
          for (const field of fields) {
            const access = `record[${JSON.stringify(field.wireName)}]`;
            const value = type.required.has(field.name) ? printer.decode(field.type, access) : printer.decodeOptional(field.type, access);
            writer.writeLine(`${field.name}: ${value},`);
          }
        });
        writer.write(';');
      },
    });

    file.addFunction({
      name: encoderName(type.name),
      isExported: true,
      parameters: [{ name: 'value', type: type.name }],
      returnType: 'unknown',
      statements: writer => {
        writer.write('return ').inlineBlock(() => {
          for (const field of fields) {
            const access = `value.${field.name}`;
            const value = type.required.has(field.name) ? printer.encode(field.type, access) : printer.encodeOptional(field.type, access);
            writer.writeLine(`${toPropertyName(field.wireName)}: ${value},`);
          }
        });
        writer.write(';');
      },
    });
  }

  private writeEnumModel(file: SourceFile, type: EnumType): void {
    file.addTypeAlias({
      name: type.name,
      isExported: true,
      docs: docs(type.doc),
      type: type.values.map(value => JSON.stringify(value)).join(' | '),
    });
    file.addVariableStatement({
      declarationKind: VariableDeclarationKind.Const,
      isExported: true,
      docs: docs(`Every value of {@link ${type.name}}, in declaration order.`),
      declarations: [
        {
          name: `${type.name}Values`,
          type: `readonly ${type.name}[]`,
          initializer: `[${type.values.map(value => JSON.stringify(value)).join(', ')}]`,
        },
      ],
    });
    file.addFunction({
      name: decoderName(type.name),
      isExported: true,
      parameters: [{ name: 'json', type: 'unknown' }],
      returnType: type.name,
      statements: [`return json as ${type.name};`],
    });
    file.addFunction({
      name: encoderName(type.name),
      isExported: true,
      parameters: [{ name: 'value', type: type.name }],
      returnType: 'unknown',
      statements: ['return value;'],
    });
  }

  private writeAliasModel(file: SourceFile, printer: TypePrinter, name: string, type: TypeRef): void {
    file.addTypeAlias({
      name,
      isExported: true,
      docs: type.kind === 'unresolved' && type.reason ? docs(`Untyped: ${type.reason}.`) : undefined,
      type: printer.typeString(type),
    });
    file.addFunction({
      name: decoderName(name),
      isExported: true,
      parameters: [{ name: 'json', type: 'unknown' }],
      returnType: name,
      statements: [`return ${printer.decode(type, 'json')};`],
    });
    file.addFunction({
      name: encoderName(name),
      isExported: true,
      parameters: [{ name: 'value', type: name }],
      returnType: 'unknown',
      statements: [`return ${printer.encode(type, 'value')};`],
    });
  }

  private writeTagModule(file: SourceFile, unit: TagUnit): void {
    const printer = new TypePrinter();

    const apiClass = file.addClass({
      name: unit.className,
      isExported: true,
      docs: docs(unit.tag === DEFAULT_TAG ? 'Operations without a tag.' : `Operations tagged "${this.jsdoc.escapeBackticks(unit.tag)}".`),
      ctors: [
        {
          parameters: [{ name: 'client', type: this.context.clientClassName, scope: Scope.Private, isReadonly: true }],
        },
      ],
    });

    for (const operation of unit.operations) {
      const returnType = this.returnType(printer, operation);
      apiClass.addMethod({
        name: operation.methodName,
        scope: Scope.Public,
        isAsync: true,
        parameters: this.methodParameters(printer, operation),
        returnType: `Promise<${returnType}>`,
        docs: [this.methodDocs(operation)],
        statements: writer => this.writeMethodBody(writer, printer, operation, returnType),
      });
    }

    const usedTypes = [...printer.usedTypes].sort();
    const usedFunctions = [...printer.usedFunctions].sort();
    const paramsTypes = [...new Set(unit.operations.flatMap(operation => (operation.paramsTypeName ? [operation.paramsTypeName] : [])))];

    file.addImportDeclaration({
      moduleSpecifier: '../client.js',
      namedImports: [this.context.clientClassName, 'RequestOptions'],
      isTypeOnly: true,
    });
    if (usedFunctions.length > 0) {
      file.addImportDeclaration({ moduleSpecifier: '../models.js', namedImports: usedFunctions });
    }
    const modelTypes = [...new Set([...usedTypes, ...paramsTypes])].sort();
    if (modelTypes.length > 0) {
      file.addImportDeclaration({ moduleSpecifier: '../models.js', namedImports: modelTypes, isTypeOnly: true });
    }
  }

  private methodParameters(printer: TypePrinter, operation: Operation): OptionalKind<ParameterDeclarationStructure>[] {
    const parameters: OptionalKind<ParameterDeclarationStructure>[] = operation.parameters
      .filter(parameter => parameter.location === 'path')
      .map(parameter => ({ name: parameter.name, type: printer.typeString(parameter.type) }));

    const paramsRequired = operation.parameters.some(parameter => parameter.location !== 'path' && parameter.required);
    const body = operation.requestBody;
    if (body) {
      const bodyType = printer.typeString(body.type);
      if (body.required) {
        parameters.push({ name: 'body', type: bodyType });
      } else if (paramsRequired) {
        // An optional parameter cannot precede the required params object
        parameters.push({ name: 'body', type: `${bodyType} | undefined` });
      } else {
        parameters.push({ name: 'body', type: bodyType, hasQuestionToken: true });
      }
    }
    if (operation.paramsTypeName !== undefined) {
      parameters.push({ name: 'params', type: operation.paramsTypeName, hasQuestionToken: !paramsRequired });
    }
    parameters.push({ name: 'options', type: 'RequestOptions', hasQuestionToken: true });
    return parameters;
  }

  private methodDocs(operation: Operation): OptionalKind<JSDocStructure> {
    const description = this.jsdoc.describeOperation(operation.summary, operation.description) ?? `${operation.method.toUpperCase()} ${operation.path}`;
    const tags: Array<{ tagName: string; text?: string }> = [];
    for (const parameter of operation.parameters.filter(candidate => candidate.location === 'path')) {
      tags.push({ tagName: 'param', text: `${parameter.name} ${parameter.description ? this.jsdoc.escapeBackticks(parameter.description) : `Path parameter "${parameter.wireName}"`}` });
    }
    if (operation.requestBody) {
      tags.push({ tagName: 'param', text: 'body Request body' });
    }
    if (operation.paramsTypeName !== undefined) {
      tags.push({ tagName: 'param', text: 'params Query and header parameters' });
    }
    tags.push({ tagName: 'param', text: 'options Optional axios request configuration' });
    if (operation.deprecated) {
      tags.push({ tagName: 'deprecated' });
    }
    return { description, tags };
  }

  private successResponses(operation: Operation): ResponseDescriptor[] {
    const successes = operation.responses.filter(response => isSuccessStatus(response.status));
    if (successes.length > 0) {
      return successes;
    }
    return operation.responses.filter(response => response.status === 'default');
  }

  private returnType(printer: TypePrinter, operation: Operation): string {
    const successes = this.successResponses(operation);
    if (successes.length === 0) {
      return operation.responses.length === 0 ? 'unknown' : 'never';
    }
    const members = [...new Set(successes.map(response => (response.type ? printer.typeString(response.type) : 'undefined')))];
    return members.length === 1 && members[0] === 'undefined' ? 'void' : members.join(' | ');
  }

  private writeMethodBody(writer: CodeBlockWriter, printer: TypePrinter, operation: Operation, returnType: string): void {
    const paramsAccess = operation.parameters.some(parameter => parameter.location !== 'path' && parameter.required) ? 'params.' : 'params?.';
    const query = operation.parameters.filter(parameter => parameter.location === 'query');
    const headers = operation.parameters.filter(parameter => parameter.location === 'header');
    const body = operation.requestBody;
    const sendsContentType = body !== undefined && !/[/+]json(;|$)/i.test(body.contentType);

    writer.write('const response = await this.client.send(').inlineBlock(() => {
      writer.writeLine(`method: ${JSON.stringify(operation.method.toUpperCase())},`);
      writer.writeLine(`url: ${pathTemplate(operation)},`);
      if (query.length > 0) {
        writer.write('query: ').inlineBlock(() => {
          for (const parameter of query) {
            writer.writeLine(`${toPropertyName(parameter.wireName)}: ${paramsAccess}${parameter.name},`);
          }
        });
        writer.write(',').newLine();
      }
      if (headers.length > 0 || sendsContentType) {
        writer.write('headers: ').inlineBlock(() => {
          for (const parameter of headers) {
            writer.writeLine(`${toPropertyName(parameter.wireName)}: ${paramsAccess}${parameter.name},`);
          }
          if (body && sendsContentType) {
            writer.writeLine(`"Content-Type": ${JSON.stringify(body.contentType)},`);
          }
        });
        writer.write(',').newLine();
      }
      if (body) {
        const encoded = body.required ? printer.encode(body.type, 'body') : printer.encodeOptional(body.type, 'body');
        writer.writeLine(`body: ${encoded},`);
      }
    });
    writer.write(', options);').newLine();

    const successes = new Set(this.successResponses(operation));
    const outcome = (response: ResponseDescriptor | undefined): string => {
      const value = response?.type ? printer.decode(response.type, 'response.data') : response ? 'undefined' : 'response.data';
      if (response && successes.has(response)) {
        return response.type || returnType !== 'void' ? `return ${value};` : 'return;';
      }
      return `return this.client.fail(response, ${value});`;
    };

    const exact = operation.responses.filter(response => /^[0-9]{3}$/.test(response.status));
    const ranges = operation.responses.filter(response => statusClass(response.status) !== undefined);
    const fallback = operation.responses.find(response => response.status === 'default');

    writer.write('switch (response.status)').block(() => {
      for (const response of exact) {
        writer.writeLine(`case ${Number(response.status)}:`);
        writer.indent(() => writer.writeLine(outcome(response)));
      }
      writer.writeLine('default:');
      writer.indent(() => {
        for (const response of ranges) {
          writer.write(`if (Math.floor(response.status / 100) === ${statusClass(response.status)})`).block(() => {
            writer.writeLine(outcome(response));
          });
        }
        if (fallback && successes.has(fallback)) {
          writer.write('if (response.status >= 200 && response.status < 300)').block(() => {
            writer.writeLine(outcome(fallback));
          });
          writer.writeLine(`return this.client.fail(response, ${fallback.type ? printer.decode(fallback.type, 'response.data') : 'response.data'});`);
        } else if (fallback) {
          writer.writeLine(outcome(fallback));
        } else if (operation.responses.length === 0) {
          writer.write('if (response.status >= 200 && response.status < 300)').block(() => {
            writer.writeLine('return response.data;');
          });
          writer.writeLine('return this.client.fail(response, response.data);');
        } else {
          writer.writeLine(outcome(undefined));
        }
      });
    });
  }

  private writeClient(file: SourceFile, units: readonly TagUnit[], auth: AuthOptions): void {
    const { clientClassName, info } = this.context;
    const optionsName = `${clientClassName}Options`;

    file.addImportDeclaration({ moduleSpecifier: 'axios', defaultImport: 'axios' });
    file.addImportDeclaration({
      moduleSpecifier: 'axios',
      namedImports: ['AxiosInstance', 'AxiosRequestConfig', 'AxiosResponse'],
      isTypeOnly: true,
    });
    for (const unit of units) {
      file.addImportDeclaration({ moduleSpecifier: `./api/${unit.moduleName}.js`, namedImports: [unit.className] });
    }

    file.addVariableStatement({
      declarationKind: VariableDeclarationKind.Const,
      isExported: true,
      docs: docs('Base URL requests go to unless the client is given another one.'),
      declarations: [{ name: 'DEFAULT_BASE_URL', initializer: JSON.stringify(this.context.baseUrl ?? '') }],
    });

    file.addTypeAlias({
      name: 'HeaderProvider',
      isExported: true,
      docs: docs('Headers added to every request, or a function producing them. Use it for schemes without a built-in helper, e.g. bearer tokens.'),
      type: 'Record<string, string> | (() => Record<string, string> | Promise<Record<string, string>>)',
    });

    file.addTypeAlias({ name: 'RequestOptions', isExported: true, type: 'AxiosRequestConfig' });

    file.addInterface({
      name: 'ApiRequest',
      isExported: true,
      properties: [
        { name: 'method', type: 'string' },
        { name: 'url', type: 'string' },
        { name: 'query', type: 'Record<string, unknown>', hasQuestionToken: true },
        { name: 'headers', type: 'Record<string, unknown>', hasQuestionToken: true },
        { name: 'body', type: 'unknown', hasQuestionToken: true },
      ],
    });

    file.addInterface({
      name: optionsName,
      isExported: true,
      properties: [
        { name: 'baseUrl', type: 'string', hasQuestionToken: true, docs: docs('Defaults to {@link DEFAULT_BASE_URL}.') },
        ...auth.apiKeys.map(key => ({
          name: key.optionName,
          type: 'string',
          hasQuestionToken: true,
          docs: docs(`API key for the "${key.schemeName}" scheme, sent as the "${key.parameterName}" ${key.location === 'header' ? 'header' : 'query parameter'}.`),
        })),
        ...(auth.basic.length > 0
          ? [
              { name: 'username', type: 'string', hasQuestionToken: true, docs: docs(`User name for HTTP basic authentication ("${auth.basic[0].schemeName}").`) },
              { name: 'password', type: 'string', hasQuestionToken: true },
            ]
          : []),
        { name: 'headers', type: 'HeaderProvider', hasQuestionToken: true },
        { name: 'axiosConfig', type: 'AxiosRequestConfig', hasQuestionToken: true },
      ],
    });

    file.addClass({
      name: 'ApiError',
      isExported: true,
      extends: 'Error',
      docs: docs('Raised for every response whose status the API description does not list as a success.'),
      properties: [
        { name: 'status', type: 'number', isReadonly: true },
        { name: 'body', type: 'unknown', isReadonly: true },
        { name: 'response', type: 'AxiosResponse<unknown>', isReadonly: true },
      ],
      ctors: [
        {
          parameters: [
            { name: 'response', type: 'AxiosResponse<unknown>' },
            { name: 'body', type: 'unknown' },
          ],
          statements: [
            'super(`Request failed with status ${response.status}`);',
            'this.name = "ApiError";',
            'this.status = response.status;',
            'this.body = body;',
            'this.response = response;',
          ],
        },
      ],
    });

    const clientDocs = [info.title, info.description ? this.jsdoc.escapeBackticks(info.description) : undefined]
      .filter((part): part is string => part !== undefined && part.length > 0)
      .join('\n\n');

    file.addClass({
      name: clientClassName,
      isExported: true,
      docs: docs(clientDocs),
      properties: [
        { name: 'axios', type: 'AxiosInstance', isReadonly: true, docs: docs('Access to the internal AxiosInstance for advanced usage') },
        ...units.map(unit => ({ name: unit.accessor, type: unit.className, isReadonly: true })),
      ],
      ctors: [
        {
          parameters: [{ name: 'options', type: optionsName, initializer: '{}', scope: Scope.Private, isReadonly: true }],
          statements: [
            'this.axios = axios.create({ ...options.axiosConfig, baseURL: options.baseUrl ?? DEFAULT_BASE_URL, validateStatus: () => true });',
            ...units.map(unit => `this.${unit.accessor} = new ${unit.className}(this);`),
          ],
        },
      ],
      methods: [
        {
          name: 'send',
          scope: Scope.Public,
          isAsync: true,
          parameters: [
            { name: 'request', type: 'ApiRequest' },
            { name: 'options', type: 'RequestOptions', hasQuestionToken: true },
          ],
          returnType: 'Promise<AxiosResponse<unknown>>',
          docs: docs('Sends one request with the configured credentials and extra headers applied.'),
          statements: writer => this.writeSendBody(writer, auth),
        },
        {
          name: 'fail',
          scope: Scope.Public,
          parameters: [
            { name: 'response', type: 'AxiosResponse<unknown>' },
            { name: 'body', type: 'unknown' },
          ],
          returnType: 'never',
          statements: ['throw new ApiError(response, body);'],
        },
      ],
    });
  }

  private writeSendBody(writer: CodeBlockWriter, auth: AuthOptions): void {
    writer.writeLine('const extraHeaders = typeof this.options.headers === "function" ? await this.options.headers() : this.options.headers;');
    writer.writeLine('const headers: Record<string, string> = { ...extraHeaders };');
    writer.writeLine('const query: Record<string, unknown> = {};');
    for (const key of auth.apiKeys) {
      writer.write(`if (this.options.${key.optionName} !== undefined)`).block(() => {
        const target = key.location === 'header' ? 'headers' : 'query';
        writer.writeLine(`${target}[${JSON.stringify(key.parameterName)}] = this.options.${key.optionName};`);
      });
    }
    writer.write('for (const [name, value] of Object.entries(request.headers ?? {}))').block(() => {
      writer.write('if (value !== undefined)').block(() => {
        writer.writeLine('headers[name] = String(value);');
      });
    });
    writer.write('for (const [name, value] of Object.entries(request.query ?? {}))').block(() => {
      writer.write('if (value !== undefined)').block(() => {
        writer.writeLine('query[name] = value;');
      });
    });
    writer.write('return this.axios.request<unknown>(').inlineBlock(() => {
      writer.writeLine('...options,');
      writer.writeLine('method: request.method,');
      writer.writeLine('url: request.url,');
      writer.writeLine('params: { ...query, ...options?.params },');
      writer.writeLine('headers: { ...headers, ...options?.headers },');
      writer.writeLine('data: request.body,');
      if (auth.basic.length > 0) {
        writer.writeLine('auth: this.options.username !== undefined ? { username: this.options.username, password: this.options.password ?? "" } : options?.auth,');
      }
    });
    writer.write(');').newLine();
  }

  private writeIndex(file: SourceFile, units: readonly TagUnit[]): void {
    const { clientClassName } = this.context;
    const optionsName = `${clientClassName}Options`;

    file.addExportDeclaration({ moduleSpecifier: './models.js' });
    file.addExportDeclaration({
      moduleSpecifier: './client.js',
      namedExports: ['ApiError', 'DEFAULT_BASE_URL', clientClassName],
    });
    file.addExportDeclaration({
      moduleSpecifier: './client.js',
      namedExports: ['ApiRequest', 'HeaderProvider', 'RequestOptions', optionsName],
      isTypeOnly: true,
    });
    for (const unit of units) {
      file.addExportDeclaration({ moduleSpecifier: `./api/${unit.moduleName}.js`, namedExports: [unit.className] });
    }

    file.addImportDeclaration({ moduleSpecifier: './client.js', namedImports: [clientClassName] });
    file.addImportDeclaration({ moduleSpecifier: './client.js', namedImports: [optionsName], isTypeOnly: true });

    file.addVariableStatement({
      declarationKind: VariableDeclarationKind.Const,
      isExported: true,
      declarations: [
        {
          name: 'createClient',
          initializer: `(options?: ${optionsName}): ${clientClassName} => new ${clientClassName}(options)`,
        },
      ],
    });
  }

  private packageManifest(): string {
    const { info, packageName } = this.context;
    const manifest = {
      name: packageName,
      version: /^\d+\.\d+\.\d+/.test(info.version) ? info.version : '0.1.0',
      description: info.description?.split('\n')[0] || `Client for ${info.title}`,
      type: 'module',
      main: 'index.ts',
      types: 'index.ts',
      dependencies: {
        axios: AXIOS_VERSION,
      },
    };
    return JSON.stringify(manifest, null, 2) + '\n';
  }

  private readme(units: readonly TagUnit[], auth: AuthOptions): string {
    const { info, packageName } = this.context;
    const credentials = [
      ...auth.apiKeys.map(key => `  ${key.optionName}: process.env.API_KEY,`),
      ...(auth.basic.length > 0 ? ['  username: "user",', '  password: "secret",'] : []),
    ];
    const lines = [
      `# ${info.title}`,
      '',
      info.description ?? `TypeScript client for ${info.title}.`,
      '',
      '## Usage',
      '',
      '```ts',
      `import { createClient } from "${packageName}";`,
      '',
      'const client = createClient({',
      ...credentials,
      '});',
      '```',
      '',
      '## Operations',
      '',
      ...units.flatMap(unit => [
        `### \`client.${unit.accessor}\` (${unit.className})`,
        '',
        ...unit.operations.map(operation => `- \`${operation.methodName}\`: ${operation.method.toUpperCase()} ${operation.path}`),
        '',
      ]),
    ];
    return lines.join('\n');
  }
}
